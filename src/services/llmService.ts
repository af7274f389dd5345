import axios, { AxiosInstance } from 'axios';
import { NarrativeGenerator } from '../types/collaborators';
import { NarrativeGenerationError } from '../middleware/errorHandler';
import { settings } from '../config/settings';
import { logger, describeError } from '../config/logger';

export interface GenerationOptions {
    temperature: number;
    numPredict: number;
    topP: number;
}

export interface OllamaGeneratorConfig {
    baseUrl?: string;
    model?: string;
    timeoutMs?: number;
    options?: Partial<GenerationOptions>;
    httpClient?: AxiosInstance;
}

interface OllamaGenerateResponse {
    response?: unknown;
}

const DEFAULT_OPTIONS: GenerationOptions = {
    temperature: 0.2,
    numPredict: 800,
    topP: 0.9,
};

/**
 * Sends the evidence prompt to an Ollama-compatible `/api/generate` endpoint.
 * Timeouts, refused connections and empty completions all raise
 * NarrativeGenerationError; retrying is left to the caller.
 */
export class OllamaNarrativeGenerator implements NarrativeGenerator {
    readonly modelName: string;
    private baseUrl: string;
    private timeout: number;
    private options: GenerationOptions;
    private http: AxiosInstance;

    constructor(config: OllamaGeneratorConfig = {}) {
        this.baseUrl = config.baseUrl || settings.ollamaHost;
        this.modelName = config.model || settings.ollamaModel;
        this.timeout = config.timeoutMs || settings.llmTimeoutMs;
        this.options = { ...DEFAULT_OPTIONS, ...config.options };
        this.http = config.httpClient || axios.create();
    }

    async generateNarrative(prompt: string, jurisdiction: string): Promise<string> {
        const startTime = Date.now();

        try {
            const response = await this.http.post<OllamaGenerateResponse>(
                `${this.baseUrl}/api/generate`,
                {
                    model: this.modelName,
                    prompt,
                    stream: false,
                    options: {
                        temperature: this.options.temperature,
                        num_predict: this.options.numPredict,
                        top_p: this.options.topP
                    }
                },
                {
                    timeout: this.timeout,
                    headers: {
                        'Content-Type': 'application/json'
                    }
                }
            );

            const narrative = typeof response.data.response === 'string' ? response.data.response.trim() : '';
            if (!narrative) {
                throw new NarrativeGenerationError('Empty response from narrative model');
            }

            logger.info('Generated narrative', {
                characters: narrative.length,
                jurisdiction,
                model: this.modelName,
                elapsedMs: Date.now() - startTime
            });

            return narrative;
        } catch (error) {
            if (error instanceof NarrativeGenerationError) {
                logger.error('Narrative generation failed', { error: error.message });
                throw error;
            }

            if (axios.isAxiosError(error)) {
                if (error.code === 'ECONNREFUSED') {
                    logger.error('Cannot connect to narrative model', { url: this.baseUrl });
                    throw new NarrativeGenerationError(`Narrative model is not reachable at ${this.baseUrl}`);
                }
                if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                    logger.error('Narrative model request timed out', { timeoutMs: this.timeout });
                    throw new NarrativeGenerationError(`Narrative generation timed out (>${Math.round(this.timeout / 1000)}s)`);
                }
            }

            logger.error('Narrative generation failed', { error: describeError(error), url: this.baseUrl });
            throw new NarrativeGenerationError(`Narrative generation failed: ${describeError(error)}`);
        }
    }

    async healthCheck(): Promise<boolean> {
        try {
            const response = await this.http.get(`${this.baseUrl}/api/tags`, { timeout: 2000 });
            return response.status === 200;
        } catch (error) {
            logger.warn('Narrative model health check failed', { error: describeError(error) });
            return false;
        }
    }
}
