import Joi from 'joi';
import { Transaction } from '../types/transaction';
import { RegulatoryAdvisory, RelationshipAnalysis, TypologyContext } from '../types/sar';
import { loadRegistry } from '../config/registry';
import { settings } from '../config/settings';
import { GRAPH_AMPLIFICATION, GraphAmplification } from '../config/detection';
import { DirectedGraph } from './graph/directedGraph';
import { validAmount } from '../utils/coercion';
import { roundTo } from '../utils/rounding';
import { logger, describeError } from '../config/logger';

export const GLOBAL_JURISDICTION = 'Global';
const MAX_RENDERED_ADVISORIES = 3;

const advisorySchema = Joi.object<RegulatoryAdvisory>({
    advisoryId: Joi.string().required(),
    title: Joi.string().required(),
    issuer: Joi.string().required(),
    typology: Joi.string().required(),
    jurisdiction: Joi.string().required(),
    description: Joi.string().required(),
    riskWeight: Joi.number().min(0).max(1).required(),
});

export const ADVISORY_REGISTRY: ReadonlyArray<Readonly<RegulatoryAdvisory>> = Object.freeze(
    loadRegistry('advisories.json', Joi.array<RegulatoryAdvisory[]>().items(advisorySchema).unique('advisoryId'))
        .map(advisory => Object.freeze(advisory))
);

export const NO_ADVISORY_EVIDENCE = 'No specific regulatory advisories matched for these typologies.';
export const NO_ADVISORY_INSIGHT = 'No specific graph-mapped typologies detected beyond flat vector similarity.';

export interface KnowledgeGraphOptions {
    fallbackJurisdiction?: string;
    amplification?: Partial<GraphAmplification>;
}

/**
 * Grounds detected typologies in regulatory advisories and measures how the
 * focus account sits in its transaction network.
 */
export class KnowledgeGraphService {
    private registry: ReadonlyArray<Readonly<RegulatoryAdvisory>>;
    private fallbackJurisdiction: string;
    private amplification: GraphAmplification;

    constructor(registry: ReadonlyArray<Readonly<RegulatoryAdvisory>> = ADVISORY_REGISTRY, options: KnowledgeGraphOptions = {}) {
        this.registry = registry;
        this.fallbackJurisdiction = options.fallbackJurisdiction ?? settings.fallbackJurisdiction;
        this.amplification = { ...GRAPH_AMPLIFICATION, ...options.amplification };
    }

    getTypologyContext(typologies: ReadonlyArray<string>, jurisdiction: string = this.fallbackJurisdiction): TypologyContext {
        const wanted = new Set(typologies.map(typology => typology.toLowerCase()));
        const relevant = this.registry.filter(advisory => wanted.has(advisory.typology.toLowerCase()));

        let matched = relevant.filter(advisory => advisory.jurisdiction === jurisdiction);

        if (matched.length === 0 && jurisdiction !== this.fallbackJurisdiction) {
            matched = relevant.filter(advisory => advisory.jurisdiction === this.fallbackJurisdiction);
        }

        for (const advisory of relevant) {
            if (advisory.jurisdiction === GLOBAL_JURISDICTION && !matched.includes(advisory)) {
                matched.push(advisory);
            }
        }

        if (matched.length === 0) {
            return {
                advisories: [],
                evidenceText: NO_ADVISORY_EVIDENCE,
                insightText: NO_ADVISORY_INSIGHT,
                confidenceScore: 0.3,
            };
        }

        // stable sort keeps registry order among equal weights
        const ranked = [...matched].sort((a, b) => b.riskWeight - a.riskWeight);
        const top = ranked.slice(0, MAX_RENDERED_ADVISORIES);

        return {
            advisories: top.map(advisory => ({ ...advisory })),
            evidenceText: top
                .map(advisory => `- [${advisory.advisoryId}] ${advisory.typology}: ${advisory.description}`)
                .join('\n'),
            insightText: `Found ${ranked.length} regulatory pattern matches.`,
            confidenceScore: roundTo(Math.min(0.6 + ranked.length * 0.1, 0.95), 2),
        };
    }

    analyzeRelationships(accountNumber: string, transactions: ReadonlyArray<Transaction> = []): RelationshipAnalysis {
        if (transactions.length === 0) {
            return this.neutralRelationshipAnalysis(accountNumber);
        }

        try {
            const graph = new DirectedGraph();
            for (const tx of transactions) {
                graph.addEdge(
                    tx.sourceAccount || 'unknown',
                    tx.destinationAccount || 'unknown',
                    validAmount(tx.amount) ?? 0
                );
            }

            if (!graph.hasNode(accountNumber)) {
                return this.neutralRelationshipAnalysis(accountNumber);
            }

            const centrality = graph.degreeCentrality().get(accountNumber) ?? 0;
            const numComponents = graph.numberOfWeaklyConnectedComponents();
            const cycles = graph.countCyclesThrough(accountNumber, this.amplification.cycleSearchBudget);

            let amplification = 1.0;
            if (cycles > 0) {
                amplification += this.amplification.perCycle * Math.min(cycles, this.amplification.maxCycles);
            }
            if (centrality >= this.amplification.centralityCutoff) {
                amplification += this.amplification.centralityBonus;
            }

            const summary = [
                `Node ${accountNumber} has centrality ${centrality.toFixed(3)} across ${graph.numberOfNodes()} nodes.`,
                cycles > 0
                    ? `Detected ${cycles} transaction cycle(s) involving this account.`
                    : 'No direct transaction cycles detected for this account.',
            ];

            return {
                relationshipSummary: summary.join(' '),
                centralityScore: roundTo(centrality, 3),
                numNodes: graph.numberOfNodes(),
                numEdges: graph.numberOfEdges(),
                numComponents,
                cyclesDetected: cycles,
                riskAmplificationFactor: roundTo(amplification, 2),
            };
        } catch (error) {
            logger.error('Graph analysis failure', { accountNumber, error: describeError(error) });
            return { ...this.neutralRelationshipAnalysis(accountNumber), fallbackReason: describeError(error) };
        }
    }

    neutralRelationshipAnalysis(accountNumber: string): RelationshipAnalysis {
        return {
            relationshipSummary: `Node ${accountNumber} shows default connectivity.`,
            centralityScore: 0.0,
            numNodes: 0,
            numEdges: 0,
            numComponents: 0,
            cyclesDetected: 0,
            riskAmplificationFactor: 1.0,
        };
    }
}
