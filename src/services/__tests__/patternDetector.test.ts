import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Transaction } from '../../types/transaction';
import { SignalBundle } from '../../types/sar';
import { PatternDetector, emptySignals } from '../patternDetector';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.parse('2024-03-01T09:00:00Z');

const tx = (id: string, overrides: Partial<Transaction> = {}): Transaction => ({
    transactionId: id,
    amount: 1000,
    date: new Date(START).toISOString(),
    sourceAccount: 'SRC-1',
    destinationAccount: 'DST-1',
    transactionType: 'transfer',
    ...overrides,
});

// Twenty deposits just under 50,000 from six accounts into one account within five days.
const funnelScenario = (): Transaction[] =>
    Array.from({ length: 20 }, (_, i) => tx(`TX-${i}`, {
        amount: 48000,
        date: new Date(START + (i % 5) * DAY_MS).toISOString(),
        sourceAccount: `SRC-${i % 6}`,
        destinationAccount: 'ACC-HUB',
    }));

const bundle = (overrides: {
    velocity?: Partial<SignalBundle['velocity']>;
    volume?: Partial<SignalBundle['volume']>;
    structuring?: Partial<SignalBundle['structuring']>;
    network?: Partial<SignalBundle['network']>;
}): SignalBundle => {
    const base = emptySignals();
    return {
        velocity: { ...base.velocity, ...overrides.velocity },
        volume: { ...base.volume, ...overrides.volume },
        structuring: { ...base.structuring, ...overrides.structuring },
        network: { ...base.network, ...overrides.network },
    };
};

describe('PatternDetector.analyze', () => {
    const detector = new PatternDetector();

    it('returns neutral signals for no transactions', () => {
        const result = detector.analyze([]);

        assert.deepEqual(result.typologies, []);
        assert.equal(result.riskScore, 0);
        assert.equal(result.velocity.risk, 'LOW');
        assert.equal(result.volume.numTransactions, 0);
    });

    it('flags a fast near-threshold funnel', () => {
        const result = detector.analyze(funnelScenario());

        assert.deepEqual(result.velocity, { timeSpanDays: 4, transactionsPerDay: 5, risk: 'HIGH' });
        assert.deepEqual(result.volume, { totalAmount: 960000, avgAmount: 48000, maxAmount: 48000, numTransactions: 20 });
        assert.deepEqual(result.structuring, { nearThresholdCount: 20, structuringLikelihood: 1, suspicious: true });
        assert.equal(result.network.uniqueSources, 6);
        assert.equal(result.network.uniqueDestinations, 1);
        assert.equal(result.network.hubDetected, true);
        assert.equal(result.network.totalNodes, 7);
        assert.equal(result.network.totalEdges, 6);
        assert.deepEqual(result.typologies, ['layering', 'structuring', 'funnel_account']);
        assert.equal(result.riskScore, 6);
    });

    it('returns identical results for identical input', () => {
        const transactions = funnelScenario();
        assert.deepEqual(detector.analyze(transactions), detector.analyze(transactions));
    });

    it('never returns an empty label set for non-empty input', () => {
        const result = detector.analyze([tx('A', { date: '2024-01-01' }), tx('B', { date: '2024-06-01', sourceAccount: 'DST-1', destinationAccount: 'SRC-1' })]);
        assert.ok(result.typologies.length > 0);
    });

    it('degrades to neutral signals when a row cannot be read', () => {
        const broken: Transaction = {
            transactionId: 'BROKEN',
            get amount(): number {
                throw new Error('unreadable amount');
            },
            date: '2024-03-01',
            sourceAccount: 'A',
            destinationAccount: 'B',
            transactionType: 'transfer',
        };

        const result = detector.analyze([broken]);

        assert.deepEqual(result.typologies, ['general_suspicious']);
        assert.equal(result.riskScore, 0);
        assert.equal(result.volume.totalAmount, 0);
    });
});

describe('PatternDetector signals', () => {
    const detector = new PatternDetector();

    it('floors the span to whole days', () => {
        const velocity = detector.analyzeVelocity([
            tx('A', { date: '2024-01-01T00:00:00Z' }),
            tx('B', { date: '2024-01-31T12:00:00Z' }),
        ]);

        assert.deepEqual(velocity, { timeSpanDays: 30, transactionsPerDay: 0.07, risk: 'LOW' });
    });

    it('rates a medium span', () => {
        const velocity = detector.analyzeVelocity([
            tx('A', { date: '2024-01-01T00:00:00Z' }),
            tx('B', { date: '2024-01-11T00:00:00Z' }),
        ]);

        assert.equal(velocity.timeSpanDays, 10);
        assert.equal(velocity.risk, 'MEDIUM');
    });

    it('treats rows without usable dates as no span', () => {
        const velocity = detector.analyzeVelocity([tx('A', { date: 'not-a-date' }), tx('B', { date: null })]);
        assert.deepEqual(velocity, { timeSpanDays: 0, transactionsPerDay: 0, risk: 'LOW' });
    });

    it('skips negative and missing amounts in volume', () => {
        const volume = detector.analyzeVolume([
            tx('A', { amount: 100 }),
            tx('B', { amount: 250.5 }),
            tx('C', { amount: -5 }),
            tx('D', { amount: null }),
        ]);

        assert.deepEqual(volume, { totalAmount: 350.5, avgAmount: 175.25, maxAmount: 250.5, numTransactions: 4 });
    });

    it('counts amounts in [90% of threshold, threshold)', () => {
        const structuring = detector.detectStructuring([
            tx('A', { amount: 45000 }),
            tx('B', { amount: 49999.99 }),
            tx('C', { amount: 50000 }),
            tx('D', { amount: 10000 }),
        ]);

        assert.deepEqual(structuring, { nearThresholdCount: 2, structuringLikelihood: 0.5, suspicious: true });
    });

    it('flags a set with 40% of amounts just under the threshold', () => {
        const amounts = [45000, 47500, 49000, 49999, 10000, 20000, 30000, 60000, 75000, 120000];
        const structuring = detector.detectStructuring(amounts.map((amount, i) => tx(`S-${i}`, { amount })));

        assert.deepEqual(structuring, { nearThresholdCount: 4, structuringLikelihood: 0.4, suspicious: true });
    });

    it('honours a configured threshold', () => {
        const structuring = new PatternDetector({ structuringThreshold: 10000 }).detectStructuring([
            tx('A', { amount: 9500 }),
            tx('B', { amount: 9000 }),
            tx('C', { amount: 8999 }),
        ]);

        assert.equal(structuring.nearThresholdCount, 2);
        assert.equal(structuring.structuringLikelihood, 0.667);
    });

    it('maps missing accounts to a shared unknown node', () => {
        const network = detector.analyzeNetwork([
            tx('A', { sourceAccount: null, destinationAccount: 'B' }),
            tx('B', { sourceAccount: 'A', destinationAccount: null }),
        ]);

        assert.equal(network.uniqueSources, 1);
        assert.equal(network.uniqueDestinations, 1);
        assert.equal(network.totalNodes, 3);
        assert.equal(network.totalEdges, 2);
    });
});

describe('PatternDetector typologies and score', () => {
    const detector = new PatternDetector();

    it('labels wide two-way fan activity', () => {
        const signals = bundle({
            network: { uniqueSources: 25, uniqueDestinations: 25, fanInHigh: true, fanOutHigh: true },
        });

        assert.deepEqual(detector.matchTypologies(signals), ['layering', 'smurfing', 'round_tripping']);
    });

    it('labels large fast totals as integration', () => {
        const signals = bundle({ velocity: { timeSpanDays: 10 }, volume: { totalAmount: 6_000_000 } });
        assert.deepEqual(detector.matchTypologies(signals), ['integration']);
    });

    it('falls back to general_suspicious', () => {
        assert.deepEqual(detector.matchTypologies(bundle({ velocity: { timeSpanDays: 90 } })), ['general_suspicious']);
    });

    it('adds up every scoring component', () => {
        const signals = bundle({
            velocity: { timeSpanDays: 40, transactionsPerDay: 6 },
            volume: { totalAmount: 12_000_000 },
            structuring: { structuringLikelihood: 0.5 },
            network: { fanInHigh: true, hubDetected: true },
        });

        // 10 + 25 + 12.5 + 15 + 5
        assert.equal(detector.calculateRiskScore(signals), 6.8);
    });

    it('rounds a tied score to the even tenth', () => {
        const signals = bundle({
            velocity: { timeSpanDays: 3 },
            structuring: { structuringLikelihood: 0.5 },
        });

        // 30 + 12.5 = 42.5 points
        assert.equal(detector.calculateRiskScore(signals), 4.2);
    });

    it('caps the score at 10', () => {
        const signals = bundle({
            volume: { totalAmount: 20_000_000 },
            structuring: { structuringLikelihood: 1 },
            network: { fanOutHigh: true, hubDetected: true },
        });

        assert.equal(detector.calculateRiskScore(signals), 10);
    });
});
