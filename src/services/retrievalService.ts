import Joi from 'joi';
import { RetrievedTemplate, SimilarCaseStore, TemplateStore } from '../types/collaborators';
import { loadRegistry } from '../config/registry';
import { logger } from '../config/logger';

export interface SarTemplate {
    templateId: string;
    typologies: string[];
    template: string;
}

export interface HistoricalCase {
    caseRef: string;
    summary: string;
}

export const DEFAULT_TEMPLATE: RetrievedTemplate = Object.freeze({
    template: 'Standard SAR regulatory structure template.',
    source: 'default_template',
});

const templateSchema = Joi.array<SarTemplate[]>().items(Joi.object<SarTemplate>({
    templateId: Joi.string().required(),
    typologies: Joi.array().items(Joi.string()).min(1).required(),
    template: Joi.string().required(),
}));

const caseSchema = Joi.array<HistoricalCase[]>().items(Joi.object<HistoricalCase>({
    caseRef: Joi.string().required(),
    summary: Joi.string().required(),
}));

// words, snake_case labels and decimals such as risk scores; single characters are noise
const tokenize = (text: string): Set<string> =>
    new Set((text.toLowerCase().match(/[a-z0-9_]+(?:\.[0-9]+)?/g) ?? []).filter(token => token.length > 1));

const jaccard = (a: Set<string>, b: Set<string>): number => {
    let shared = 0;
    for (const token of a) {
        if (b.has(token)) shared++;
    }
    const union = a.size + b.size - shared;
    return union === 0 ? 0 : shared / union;
};

/**
 * Narrative templates ranked by how many of the requested typologies they
 * cover. When none matches the built-in default template is returned; a
 * registry that cannot be loaded rejects.
 */
export class FileTemplateStore implements TemplateStore {
    private templates: SarTemplate[] | null = null;
    private load: () => SarTemplate[];

    constructor(load: () => SarTemplate[] = () => loadRegistry('sarTemplates.json', templateSchema)) {
        this.load = load;
    }

    async retrieveTemplates(typologies: ReadonlyArray<string>, topK: number = 3): Promise<RetrievedTemplate[]> {
        this.templates = this.templates ?? this.load();
        const wanted = new Set(typologies.map(typology => typology.toLowerCase()));

        const ranked = this.templates
            .map(template => ({
                template,
                overlap: template.typologies.filter(typology => wanted.has(typology.toLowerCase())).length,
            }))
            .filter(entry => entry.overlap > 0)
            .sort((a, b) => b.overlap - a.overlap)
            .slice(0, topK)
            .map(({ template }) => ({ template: template.template, source: template.templateId }));

        if (ranked.length === 0) {
            logger.warn('No template matched, using default', { typologies });
            return [{ ...DEFAULT_TEMPLATE }];
        }
        return ranked;
    }
}

/** Historical case summaries ranked by token overlap with the query. */
export class FileSimilarCaseStore implements SimilarCaseStore {
    private cases: HistoricalCase[] | null = null;
    private load: () => HistoricalCase[];

    constructor(load: () => HistoricalCase[] = () => loadRegistry('historicalCases.json', caseSchema)) {
        this.load = load;
    }

    async retrieveSimilarCases(query: string, topK: number = 3): Promise<string[]> {
        this.cases = this.cases ?? this.load();
        const queryTokens = tokenize(query);

        return this.cases
            .map(entry => ({ entry, score: jaccard(queryTokens, tokenize(entry.summary)) }))
            .filter(({ score }) => score > 0)
            .sort((a, b) => b.score - a.score)
            .slice(0, topK)
            .map(({ entry }) => `[${entry.caseRef}] ${entry.summary}`);
    }
}

export const buildSimilarCaseQuery = (riskScore: number, typologies: ReadonlyArray<string>): string =>
    `Risk score ${riskScore.toFixed(1)}, typologies: ${typologies.join(', ')}`;
