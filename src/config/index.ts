import dotenv from 'dotenv';
import { GridLayout } from '../domain/services/PanelPromptComposer';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    environment: string;

    // OpenAI (reversal narration)
    openaiApiKey: string;
    openaiModel: string;
    openaiBaseUrl: string;

    // Reversal pass
    reversal: {
        timeoutMs: number;
        maxAttempts: number; // Includes the first attempt
        initialBackoffMs: number;
        temperature: number;
        panelConcurrency: number;
        requestsPerMinute: number; // 0 disables the limiter
    };

    // Orchestration
    sceneConcurrency: number;

    // Template store
    templatesDir: string;
    templatesOverrideDir: string; // Empty when no overrides are used

    // Storyboard layout
    format: {
        gridLayout: GridLayout;
        panelDurationSeconds: number;
        dialogueEnabled: boolean;
        captionsEnabled: boolean;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = getEnvVar(key, defaultValue?.toString());
    return value.toLowerCase() === 'true';
}

function getEnvVarGridLayout(key: string, defaultValue: GridLayout): GridLayout {
    const value = getEnvVar(key, defaultValue).toLowerCase();
    if (value === 'dual' || value === 'single') {
        return value;
    }
    throw new Error(`Environment variable ${key} must be "dual" or "single", got: ${value}`);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        environment: getEnvVar('NODE_ENV', 'development'),

        // OpenAI
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4.1'),
        openaiBaseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com'),

        // Reversal pass
        reversal: {
            timeoutMs: getEnvVarNumber('REVERSAL_TIMEOUT_MS', 60000),
            maxAttempts: getEnvVarNumber('REVERSAL_MAX_ATTEMPTS', 2),
            initialBackoffMs: getEnvVarNumber('REVERSAL_BACKOFF_MS', 1000),
            temperature: getEnvVarNumber('REVERSAL_TEMPERATURE', 0.5),
            panelConcurrency: getEnvVarNumber('PANEL_CONCURRENCY', 4),
            requestsPerMinute: getEnvVarNumber('REVERSAL_RPM', 25),
        },

        // Orchestration
        sceneConcurrency: getEnvVarNumber('SCENE_CONCURRENCY', 2),

        // Template store
        templatesDir: getEnvVar('TEMPLATES_DIR', './templates'),
        templatesOverrideDir: getEnvVar('TEMPLATES_OVERRIDE_DIR', ''),

        // Storyboard layout
        format: {
            gridLayout: getEnvVarGridLayout('STORYBOARD_GRID_LAYOUT', 'dual'),
            panelDurationSeconds: getEnvVarNumber('PANEL_DURATION_SECONDS', 7),
            dialogueEnabled: getEnvVarBoolean('STORYBOARD_DIALOGUE_ENABLED', true),
            captionsEnabled: getEnvVarBoolean('STORYBOARD_CAPTIONS_ENABLED', false),
        },
    };
}

/**
 * Validates that the configuration can drive a run. The API key is only
 * needed when the built-in narration client is used.
 */
export function validateConfig(config: Config, requireNarrationBackend: boolean = true): string[] {
    const errors: string[] = [];

    if (requireNarrationBackend && !config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is required for reversal narration');
    }
    if (config.reversal.timeoutMs <= 0) {
        errors.push('REVERSAL_TIMEOUT_MS must be positive');
    }
    if (config.reversal.maxAttempts < 1) {
        errors.push('REVERSAL_MAX_ATTEMPTS must be at least 1');
    }
    if (config.reversal.panelConcurrency < 1) {
        errors.push('PANEL_CONCURRENCY must be at least 1');
    }
    if (config.reversal.requestsPerMinute < 0) {
        errors.push('REVERSAL_RPM must not be negative');
    }
    if (config.sceneConcurrency < 1) {
        errors.push('SCENE_CONCURRENCY must be at least 1');
    }
    if (config.format.panelDurationSeconds <= 0) {
        errors.push('PANEL_DURATION_SECONDS must be positive');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
