import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Transaction } from '../../types/transaction';
import { RegulatoryAdvisory } from '../../types/sar';
import {
    ADVISORY_REGISTRY,
    KnowledgeGraphService,
    NO_ADVISORY_EVIDENCE,
    NO_ADVISORY_INSIGHT,
} from '../knowledgeGraphService';

const transfer = (id: string, sourceAccount: string, destinationAccount: string): Transaction => ({
    transactionId: id,
    amount: 5000,
    date: '2024-03-01T10:00:00Z',
    sourceAccount,
    destinationAccount,
    transactionType: 'transfer',
});

describe('advisory registry', () => {
    it('keeps every weight in [0, 1]', () => {
        assert.ok(ADVISORY_REGISTRY.length > 0);
        for (const advisory of ADVISORY_REGISTRY) {
            assert.ok(advisory.riskWeight >= 0 && advisory.riskWeight <= 1, advisory.advisoryId);
        }
    });

    it('is frozen', () => {
        assert.ok(Object.isFrozen(ADVISORY_REGISTRY));
        assert.ok(Object.isFrozen(ADVISORY_REGISTRY[0]));
    });
});

describe('KnowledgeGraphService.getTypologyContext', () => {
    const service = new KnowledgeGraphService();

    it('combines local and global advisories by weight', () => {
        const context = service.getTypologyContext(['structuring'], 'IN');

        assert.deepEqual(context.advisories.map(advisory => advisory.advisoryId), ['ADV-STR-001', 'ADV-STR-004']);
        assert.equal(context.insightText, 'Found 2 regulatory pattern matches.');
        assert.equal(context.confidenceScore, 0.8);
    });

    it('falls back to India when the jurisdiction has nothing', () => {
        const context = service.getTypologyContext(['hawala'], 'US');

        assert.deepEqual(context.advisories.map(advisory => advisory.advisoryId), ['ADV-HAW-001']);
        assert.equal(context.confidenceScore, 0.7);
    });

    it('adds global advisories when the jurisdiction has none of its own', () => {
        const context = service.getTypologyContext(['layering'], 'SG');

        assert.deepEqual(context.advisories.map(advisory => advisory.advisoryId), ['ADV-LAY-002', 'ADV-LAY-001']);
        assert.ok(context.advisories.some(advisory => advisory.jurisdiction === 'Global'));
        assert.equal(context.confidenceScore, 0.8);
        assert.ok(context.confidenceScore >= 0.3);
    });

    it('matches typologies case-insensitively', () => {
        const context = service.getTypologyContext(['LAYERING'], 'UK');
        assert.deepEqual(context.advisories.map(advisory => advisory.advisoryId), ['ADV-LAY-004', 'ADV-LAY-001']);
    });

    it('renders the top three but counts every match', () => {
        const context = service.getTypologyContext(['layering', 'structuring', 'round_tripping'], 'IN');

        assert.deepEqual(context.advisories.map(advisory => advisory.advisoryId), ['ADV-STR-001', 'ADV-LAY-002', 'ADV-RTR-002']);
        assert.equal(context.evidenceText.split('\n').length, 3);
        assert.equal(context.insightText, 'Found 6 regulatory pattern matches.');
        assert.equal(context.confidenceScore, 0.95);
    });

    it('returns the fixed messages when nothing matches', () => {
        const context = service.getTypologyContext(['general_suspicious'], 'IN');

        assert.deepEqual(context.advisories, []);
        assert.equal(context.evidenceText, NO_ADVISORY_EVIDENCE);
        assert.equal(context.insightText, NO_ADVISORY_INSIGHT);
        assert.equal(context.confidenceScore, 0.3);
    });

    it('formats each evidence line with id, typology and description', () => {
        const registry: RegulatoryAdvisory[] = [{
            advisoryId: 'T-1',
            title: 'Test advisory',
            issuer: 'Test issuer',
            typology: 'layering',
            jurisdiction: 'IN',
            description: 'Rapid movement between accounts.',
            riskWeight: 0.5,
        }];

        const context = new KnowledgeGraphService(registry).getTypologyContext(['layering'], 'IN');
        assert.equal(context.evidenceText, '- [T-1] layering: Rapid movement between accounts.');
    });
});

describe('KnowledgeGraphService.analyzeRelationships', () => {
    const service = new KnowledgeGraphService();

    it('is neutral without transactions', () => {
        const analysis = service.analyzeRelationships('ACC-A', []);

        assert.equal(analysis.fallbackReason, undefined);
        assert.equal(analysis.relationshipSummary, 'Node ACC-A shows default connectivity.');
        assert.equal(analysis.riskAmplificationFactor, 1);
        assert.equal(analysis.numNodes, 0);
    });

    it('is neutral when the account is not in the graph', () => {
        const analysis = service.analyzeRelationships('ACC-Z', [transfer('T1', 'A', 'B')]);
        assert.equal(analysis.relationshipSummary, 'Node ACC-Z shows default connectivity.');
        assert.equal(analysis.centralityScore, 0);
    });

    it('amplifies a round trip through a central account', () => {
        const analysis = service.analyzeRelationships('A', [transfer('T1', 'A', 'B'), transfer('T2', 'B', 'A')]);

        assert.deepEqual(analysis, {
            relationshipSummary: 'Node A has centrality 2.000 across 2 nodes. Detected 1 transaction cycle(s) involving this account.',
            centralityScore: 2,
            numNodes: 2,
            numEdges: 2,
            numComponents: 1,
            cyclesDetected: 1,
            riskAmplificationFactor: 1.25,
        });
    });

    it('leaves a plain chain unamplified', () => {
        const analysis = service.analyzeRelationships('A', [transfer('T1', 'A', 'B'), transfer('T2', 'B', 'C')]);

        assert.equal(analysis.relationshipSummary, 'Node A has centrality 0.500 across 3 nodes. No direct transaction cycles detected for this account.');
        assert.equal(analysis.centralityScore, 0.5);
        assert.equal(analysis.cyclesDetected, 0);
        assert.equal(analysis.riskAmplificationFactor, 1);
    });

    it('caps the cycle contribution at five cycles', () => {
        const transactions = ['B1', 'B2', 'B3', 'B4', 'B5', 'B6'].flatMap(peer => [
            transfer(`${peer}-out`, 'A', peer),
            transfer(`${peer}-in`, peer, 'A'),
        ]);

        const analysis = service.analyzeRelationships('A', transactions);

        assert.equal(analysis.cyclesDetected, 6);
        assert.equal(analysis.riskAmplificationFactor, 1.85);
    });

    it('falls back to neutral when the cycle search runs out of budget', () => {
        const limited = new KnowledgeGraphService(ADVISORY_REGISTRY, { amplification: { cycleSearchBudget: 1 } });
        const analysis = limited.analyzeRelationships('A', [
            transfer('T1', 'A', 'B'),
            transfer('T2', 'B', 'C'),
            transfer('T3', 'C', 'A'),
        ]);

        assert.equal(analysis.relationshipSummary, 'Node A shows default connectivity.');
        assert.equal(analysis.riskAmplificationFactor, 1);
        assert.equal(analysis.fallbackReason, 'Cycle search exceeded 1 expansions');
    });
});
