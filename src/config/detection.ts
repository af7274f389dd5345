/**
 * Thresholds and point weights used by the pattern detector and the
 * relationship analysis. None of these carry a documented regulatory
 * derivation; they are kept together so deployments can tune them.
 */
export interface DetectionThresholds {
    structuringThreshold: number;
    nearThresholdRatio: number;
    structuringSuspiciousLikelihood: number;

    fanInSources: number;
    fanOutDestinations: number;
    hubCentrality: number;

    layeringMaxSpanDays: number;
    layeringMinSources: number;
    smurfingMinSources: number;
    integrationMinTotal: number;
    integrationMaxSpanDays: number;

    highVelocitySpanDays: number;
    mediumVelocitySpanDays: number;
    velocityRatePerDay: number;
}

export interface RiskWeights {
    velocityHigh: number;
    velocityMedium: number;
    velocityRate: number;

    volumeTiers: ReadonlyArray<{ above: number; points: number }>;

    structuringMax: number;
    networkFan: number;
    networkHub: number;

    maxScore: number;
}

export interface GraphAmplification {
    perCycle: number;
    maxCycles: number;
    centralityCutoff: number;
    centralityBonus: number;
    cycleSearchBudget: number;
}

export const DETECTION_THRESHOLDS: Readonly<DetectionThresholds> = Object.freeze({
    structuringThreshold: parseFloat(process.env.STRUCTURING_THRESHOLD || '50000'),
    nearThresholdRatio: 0.9,
    structuringSuspiciousLikelihood: 0.3,

    fanInSources: 20,
    fanOutDestinations: 20,
    hubCentrality: 0.5,

    layeringMaxSpanDays: 7,
    layeringMinSources: 5,
    smurfingMinSources: 15,
    integrationMinTotal: 5_000_000,
    integrationMaxSpanDays: 14,

    highVelocitySpanDays: 7,
    mediumVelocitySpanDays: 30,
    velocityRatePerDay: 5,
});

export const RISK_WEIGHTS: Readonly<RiskWeights> = Object.freeze({
    velocityHigh: 30,
    velocityMedium: 15,
    velocityRate: 10,

    // first matching tier wins
    volumeTiers: Object.freeze([
        { above: 10_000_000, points: 25 },
        { above: 5_000_000, points: 18 },
        { above: 1_000_000, points: 10 },
    ]),

    structuringMax: 25,
    networkFan: 15,
    networkHub: 5,

    maxScore: 10,
});

export const GRAPH_AMPLIFICATION: Readonly<GraphAmplification> = Object.freeze({
    perCycle: 0.15,
    maxCycles: 5,
    centralityCutoff: 0.6,
    centralityBonus: 0.1,
    cycleSearchBudget: parseInt(process.env.CYCLE_SEARCH_BUDGET || '100000'),
});
