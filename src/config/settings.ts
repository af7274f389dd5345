import path from 'path';

export interface Settings {
    appName: string;
    appVersion: string;
    jurisdiction: string;
    fallbackJurisdiction: string;
    deploymentEnv: string;
    ollamaHost: string;
    ollamaModel: string;
    llmTimeoutMs: number;
    dataDir: string;
}

export const settings: Settings = {
    appName: 'SAR Evidence Pipeline',
    appVersion: process.env.npm_package_version || '1.0.0',
    jurisdiction: (process.env.JURISDICTION || 'IN').toUpperCase(),
    fallbackJurisdiction: 'IN',
    deploymentEnv: process.env.DEPLOYMENT_ENV || 'production',
    ollamaHost: process.env.OLLAMA_HOST || 'http://localhost:11434',
    ollamaModel: process.env.OLLAMA_MODEL || 'llama3.2:latest',
    llmTimeoutMs: parseInt(process.env.LLM_TIMEOUT_MS || '120000'),
    // src/config and dist/config both sit two levels below the repository root
    dataDir: process.env.DATA_DIR || path.resolve(__dirname, '../../data'),
};
