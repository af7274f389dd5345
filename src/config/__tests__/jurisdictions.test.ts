import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
    JURISDICTION_CONTEXT,
    SUPPORTED_JURISDICTIONS,
    getJurisdictionContext,
    isSupportedJurisdiction,
    resolveJurisdiction,
} from '../jurisdictions';

describe('jurisdiction registry', () => {
    it('covers the eight supported jurisdictions', () => {
        assert.deepEqual([...SUPPORTED_JURISDICTIONS].sort(), ['AU', 'EU', 'HK', 'IN', 'SG', 'UAE', 'UK', 'US']);
    });

    it('fills every field with at least four report sections', () => {
        for (const code of SUPPORTED_JURISDICTIONS) {
            const context = JURISDICTION_CONTEXT[code];
            assert.ok(context.regulatoryBody.length > 0, `${code} regulatoryBody`);
            assert.ok(context.currencySymbol.length > 0, `${code} currencySymbol`);
            assert.ok(context.identityName.length > 0, `${code} identityName`);
            assert.ok(context.filingThreshold.length > 0, `${code} filingThreshold`);
            assert.ok(context.legalTerminology.length > 0, `${code} legalTerminology`);
            assert.ok(context.reportingForm.length > 0, `${code} reportingForm`);
            assert.ok(context.sarSections.length >= 4, `${code} sarSections`);
        }
    });

    it('uses the local currency symbol', () => {
        assert.equal(getJurisdictionContext('IN').currencySymbol, '₹');
        assert.equal(getJurisdictionContext('US').currencySymbol, '$');
        assert.equal(getJurisdictionContext('UK').currencySymbol, '£');
        assert.equal(getJurisdictionContext('EU').currencySymbol, '€');
    });

    it('falls back to India for unknown codes', () => {
        assert.equal(getJurisdictionContext('ZZ').regulatoryBody, 'Financial Intelligence Unit (FIU-IND)');
    });

    it('looks codes up case-insensitively', () => {
        assert.equal(getJurisdictionContext('us').reportingForm, 'FinCEN SAR Form');
    });

    it('reports support only for registered codes', () => {
        assert.equal(isSupportedJurisdiction('SG'), true);
        assert.equal(isSupportedJurisdiction('ZZ'), false);
    });
});

describe('resolveJurisdiction', () => {
    it('prefers the request override, upper-cased', () => {
        assert.equal(resolveJurisdiction(' uk ', 'IN'), 'UK');
    });

    it('uses the default when no override is given', () => {
        assert.equal(resolveJurisdiction(undefined, 'us'), 'US');
        assert.equal(resolveJurisdiction('  ', 'AU'), 'AU');
        assert.equal(resolveJurisdiction(null, 'SG'), 'SG');
    });
});
