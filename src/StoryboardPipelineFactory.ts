/**
 * Storyboard Pipeline Factory
 *
 * Creates a fully-wired pipeline: template store, resolver, validator,
 * reversal transformer and orchestrator.
 */

import path from 'path';
import { Config, getConfig, validateConfig } from './config';
import { ITemplateRepository } from './domain/ports/ITemplateRepository';
import { IReversalNarrationGenerator } from './domain/ports/IReversalNarrationGenerator';
import { PanelSchemaValidator } from './domain/services/PanelSchemaValidator';
import { PlaceholderResolver } from './domain/services/PlaceholderResolver';
import { ReversalTransformer } from './application/ReversalTransformer';
import { StoryboardOrchestrator } from './application/StoryboardOrchestrator';
import { createScenePipeline } from './application/pipelines/ScenePipeline';
import { InMemoryTemplateRepository } from './infrastructure/templates/InMemoryTemplateRepository';
import { loadTemplatesWithOverrides } from './infrastructure/templates/TemplateDirectoryLoader';
import { RateLimiter } from './infrastructure/resilience/RateLimiter';
import { OpenAIService } from './infrastructure/llm/OpenAIService';
import { ReversalNarrationClient } from './infrastructure/llm/ReversalNarrationClient';

export interface StoryboardPipelineOptions {
    /** Defaults to the environment configuration */
    config?: Config;
    /** Defaults to the OpenAI-backed narration client */
    generator?: IReversalNarrationGenerator;
    /** Defaults to config.templatesDir, overlaid with config.templatesOverrideDir */
    templates?: ITemplateRepository;
}

export interface StoryboardPipeline {
    orchestrator: StoryboardOrchestrator;
    resolver: PlaceholderResolver;
    templates: ITemplateRepository;
}

/**
 * Creates a storyboard pipeline with all dependencies wired.
 *
 * @example
 * ```typescript
 * const { orchestrator } = createStoryboardPipeline();
 * const report = await orchestrator.run(scenes, { wrap: { templateId: 'panel-grid' } });
 * ```
 */
export function createStoryboardPipeline(options: StoryboardPipelineOptions = {}): StoryboardPipeline {
    const config = options.config ?? getConfig();

    const problems = validateConfig(config, options.generator === undefined);
    if (problems.length > 0) {
        throw new Error(`Invalid storyboard configuration:\n  - ${problems.join('\n  - ')}`);
    }

    const templates = options.templates
        ?? new InMemoryTemplateRepository(loadTemplatesWithOverrides(
            path.resolve(config.templatesDir),
            config.templatesOverrideDir ? path.resolve(config.templatesOverrideDir) : undefined
        ));
    const resolver = new PlaceholderResolver(templates);

    const generator = options.generator ?? new ReversalNarrationClient(
        new OpenAIService(config.openaiApiKey, config.openaiModel, config.openaiBaseUrl),
        {
            temperature: config.reversal.temperature,
            defaultDurationSeconds: config.format.panelDurationSeconds,
        }
    );

    const transformer = new ReversalTransformer(generator, {
        timeoutMs: config.reversal.timeoutMs,
        maxAttempts: config.reversal.maxAttempts,
        initialBackoffMs: config.reversal.initialBackoffMs,
        panelConcurrency: config.reversal.panelConcurrency,
        rateLimiter: config.reversal.requestsPerMinute > 0
            ? new RateLimiter(config.reversal.requestsPerMinute)
            : undefined,
    });

    const steps = createScenePipeline({
        validator: new PanelSchemaValidator(),
        transformer,
        resolver,
        format: {
            gridLayout: config.format.gridLayout,
            dialogueEnabled: config.format.dialogueEnabled,
            captionsEnabled: config.format.captionsEnabled,
        },
    });

    const orchestrator = new StoryboardOrchestrator(steps, { sceneConcurrency: config.sceneConcurrency });

    return { orchestrator, resolver, templates };
}
