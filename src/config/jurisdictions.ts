import Joi from 'joi';
import { JurisdictionContext } from '../types/sar';
import { loadRegistry } from './registry';
import { settings } from './settings';

const jurisdictionSchema = Joi.object<JurisdictionContext>({
    regulatoryBody: Joi.string().required(),
    currencySymbol: Joi.string().required(),
    identityName: Joi.string().required(),
    filingThreshold: Joi.string().required(),
    legalTerminology: Joi.string().required(),
    reportingForm: Joi.string().required(),
    sarSections: Joi.array().items(Joi.string()).min(4).required(),
});

const registrySchema = Joi.object<Record<string, JurisdictionContext>>()
    .pattern(Joi.string().uppercase(), jurisdictionSchema)
    .min(1);

export const JURISDICTION_CONTEXT: Readonly<Record<string, Readonly<JurisdictionContext>>> = Object.freeze(
    loadRegistry('jurisdictions.json', registrySchema)
);

export const SUPPORTED_JURISDICTIONS: readonly string[] = Object.freeze(Object.keys(JURISDICTION_CONTEXT));

export const isSupportedJurisdiction = (code: string): boolean =>
    Object.prototype.hasOwnProperty.call(JURISDICTION_CONTEXT, code);

/** Request override, else the configured default, normalised to upper case. */
export const resolveJurisdiction = (requested?: string | null, defaultCode: string = settings.jurisdiction): string =>
    (requested && requested.trim() !== '' ? requested : defaultCode).trim().toUpperCase();

export const getJurisdictionContext = (code: string): Readonly<JurisdictionContext> =>
    JURISDICTION_CONTEXT[code.toUpperCase()] ?? JURISDICTION_CONTEXT[settings.fallbackJurisdiction];
