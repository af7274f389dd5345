import { Transaction } from '../types/transaction';
import {
    NetworkSignal,
    PatternAnalysis,
    RiskTier,
    SignalBundle,
    StructuringSignal,
    TypologyLabel,
    VelocitySignal,
    VolumeSignal,
} from '../types/sar';
import {
    DETECTION_THRESHOLDS,
    DetectionThresholds,
    RISK_WEIGHTS,
    RiskWeights,
} from '../config/detection';
import { DirectedGraph } from './graph/directedGraph';
import { roundTo } from '../utils/rounding';
import { validAmount, validTimestamp } from '../utils/coercion';
import { logger, describeError } from '../config/logger';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const UNKNOWN_ACCOUNT = 'unknown';

export const emptySignals = (): SignalBundle => ({
    velocity: { timeSpanDays: 0, transactionsPerDay: 0, risk: 'LOW' },
    volume: { totalAmount: 0, avgAmount: 0, maxAmount: 0, numTransactions: 0 },
    structuring: { nearThresholdCount: 0, structuringLikelihood: 0, suspicious: false },
    network: {
        uniqueSources: 0,
        uniqueDestinations: 0,
        fanInHigh: false,
        fanOutHigh: false,
        hubDetected: false,
        totalNodes: 0,
        totalEdges: 0,
    },
});

const accountOf = (account: string | null | undefined): string | null =>
    typeof account === 'string' && account.trim() !== '' ? account : null;

/**
 * Turns a customer's transaction history into velocity, volume, structuring
 * and network signals, the typologies they match, and a 0-10 risk score.
 * Stateless: the same input always produces the same analysis.
 */
export class PatternDetector {
    private thresholds: DetectionThresholds;
    private weights: RiskWeights;

    constructor(thresholds: Partial<DetectionThresholds> = {}, weights: Partial<RiskWeights> = {}) {
        this.thresholds = { ...DETECTION_THRESHOLDS, ...thresholds };
        this.weights = { ...RISK_WEIGHTS, ...weights };
    }

    analyze(transactions: ReadonlyArray<Transaction>): PatternAnalysis {
        if (transactions.length === 0) {
            return { ...emptySignals(), typologies: [], riskScore: 0 };
        }

        try {
            const signals: SignalBundle = {
                velocity: this.analyzeVelocity(transactions),
                volume: this.analyzeVolume(transactions),
                structuring: this.detectStructuring(transactions),
                network: this.analyzeNetwork(transactions),
            };

            const typologies = this.matchTypologies(signals);
            const riskScore = this.calculateRiskScore(signals);

            logger.info('Pattern analysis complete', { riskScore, typologies });

            return { ...signals, typologies, riskScore };
        } catch (error) {
            logger.error('Pattern analysis failed, returning neutral signals', { error: describeError(error) });
            return { ...emptySignals(), typologies: ['general_suspicious'], riskScore: 0 };
        }
    }

    analyzeVelocity(transactions: ReadonlyArray<Transaction>): VelocitySignal {
        const timestamps = transactions
            .map(tx => validTimestamp(tx.date))
            .filter((time): time is number => time !== null);

        if (timestamps.length === 0) {
            return { timeSpanDays: 0, transactionsPerDay: 0, risk: 'LOW' };
        }

        const first = timestamps.reduce((min, time) => Math.min(min, time));
        const last = timestamps.reduce((max, time) => Math.max(max, time));
        const timeSpanDays = Math.floor((last - first) / MS_PER_DAY);
        const transactionsPerDay = transactions.length / Math.max(timeSpanDays, 1);

        let risk: RiskTier;
        if (timeSpanDays < this.thresholds.highVelocitySpanDays) {
            risk = 'HIGH';
        } else if (timeSpanDays < this.thresholds.mediumVelocitySpanDays) {
            risk = 'MEDIUM';
        } else {
            risk = 'LOW';
        }

        return {
            timeSpanDays,
            transactionsPerDay: roundTo(transactionsPerDay, 2),
            risk,
        };
    }

    analyzeVolume(transactions: ReadonlyArray<Transaction>): VolumeSignal {
        const amounts = this.amountsOf(transactions);

        if (amounts.length === 0) {
            return { totalAmount: 0, avgAmount: 0, maxAmount: 0, numTransactions: 0 };
        }

        const total = amounts.reduce((sum, amount) => sum + amount, 0);

        return {
            totalAmount: roundTo(total, 2),
            avgAmount: roundTo(total / amounts.length, 2),
            maxAmount: roundTo(amounts.reduce((max, amount) => Math.max(max, amount)), 2),
            numTransactions: transactions.length,
        };
    }

    detectStructuring(transactions: ReadonlyArray<Transaction>): StructuringSignal {
        const amounts = this.amountsOf(transactions);

        if (amounts.length === 0) {
            return { nearThresholdCount: 0, structuringLikelihood: 0, suspicious: false };
        }

        const threshold = this.thresholds.structuringThreshold;
        const floor = threshold * this.thresholds.nearThresholdRatio;
        const nearThresholdCount = amounts.filter(amount => amount >= floor && amount < threshold).length;
        const likelihood = nearThresholdCount / amounts.length;

        return {
            nearThresholdCount,
            structuringLikelihood: roundTo(likelihood, 3),
            suspicious: likelihood > this.thresholds.structuringSuspiciousLikelihood,
        };
    }

    analyzeNetwork(transactions: ReadonlyArray<Transaction>): NetworkSignal {
        const graph = new DirectedGraph();
        const sources = new Set<string>();
        const destinations = new Set<string>();

        for (const tx of transactions) {
            const source = accountOf(tx.sourceAccount);
            const destination = accountOf(tx.destinationAccount);

            if (source) sources.add(source);
            if (destination) destinations.add(destination);

            graph.addEdge(source ?? UNKNOWN_ACCOUNT, destination ?? UNKNOWN_ACCOUNT, validAmount(tx.amount) ?? 0);
        }

        let maxCentrality = 0;
        for (const value of graph.degreeCentrality().values()) {
            maxCentrality = Math.max(maxCentrality, value);
        }

        return {
            uniqueSources: sources.size,
            uniqueDestinations: destinations.size,
            fanInHigh: sources.size > this.thresholds.fanInSources,
            fanOutHigh: destinations.size > this.thresholds.fanOutDestinations,
            hubDetected: maxCentrality > this.thresholds.hubCentrality,
            totalNodes: graph.numberOfNodes(),
            totalEdges: graph.numberOfEdges(),
        };
    }

    /** Label order is for presentation only; scoring never reads it. */
    matchTypologies(signals: SignalBundle): TypologyLabel[] {
        const { velocity, volume, structuring, network } = signals;
        const t = this.thresholds;
        const typologies: TypologyLabel[] = [];

        if (velocity.timeSpanDays < t.layeringMaxSpanDays && network.uniqueSources > t.layeringMinSources) {
            typologies.push('layering');
        }

        if (structuring.suspicious) {
            typologies.push('structuring');
        }

        if (network.uniqueSources > t.smurfingMinSources) {
            typologies.push('smurfing');
        }

        if (volume.totalAmount > t.integrationMinTotal && velocity.timeSpanDays < t.integrationMaxSpanDays) {
            typologies.push('integration');
        }

        if (network.fanInHigh && network.fanOutHigh) {
            typologies.push('round_tripping');
        }

        if (network.hubDetected) {
            typologies.push('funnel_account');
        }

        if (typologies.length === 0) {
            typologies.push('general_suspicious');
        }

        return typologies;
    }

    calculateRiskScore(signals: SignalBundle): number {
        const { velocity, volume, structuring, network } = signals;
        const w = this.weights;
        const t = this.thresholds;
        let score = 0;

        if (velocity.timeSpanDays < t.highVelocitySpanDays) {
            score += w.velocityHigh;
        } else if (velocity.timeSpanDays < t.mediumVelocitySpanDays) {
            score += w.velocityMedium;
        } else if (velocity.transactionsPerDay > t.velocityRatePerDay) {
            score += w.velocityRate;
        }

        const tier = w.volumeTiers.find(candidate => volume.totalAmount > candidate.above);
        if (tier) {
            score += tier.points;
        }

        score += structuring.structuringLikelihood * w.structuringMax;

        if (network.fanInHigh || network.fanOutHigh) {
            score += w.networkFan;
        }
        if (network.hubDetected) {
            score += w.networkHub;
        }

        return Math.min(roundTo(score / 10, 1), w.maxScore);
    }

    private amountsOf(transactions: ReadonlyArray<Transaction>): number[] {
        return transactions
            .map(tx => validAmount(tx.amount))
            .filter((amount): amount is number => amount !== null);
    }
}
