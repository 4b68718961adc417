export { createStoryboardPipeline, StoryboardPipeline, StoryboardPipelineOptions } from './StoryboardPipelineFactory';
export { Config, loadConfig, validateConfig, getConfig, resetConfig } from './config';

export * from './domain/entities/Scene';
export * from './domain/entities/Template';
export * from './domain/errors/StoryboardErrors';
export { ITemplateRepository } from './domain/ports/ITemplateRepository';
export {
    IReversalNarrationGenerator,
    ReversalNarrationRequest,
    ReversalNarrationOptions,
} from './domain/ports/IReversalNarrationGenerator';
export { PlaceholderResolver, renderTemplate } from './domain/services/PlaceholderResolver';
export { PanelSchemaValidator } from './domain/services/PanelSchemaValidator';
export { swapRenderFrames, renderFramesFor, toRenderFacingPanel } from './domain/services/FrameReversal';
export {
    GridLayout,
    StoryboardFormat,
    DEFAULT_STORYBOARD_FORMAT,
    composePanelBlock,
    composeLayoutInstruction,
    composeCaptionInstruction,
    composeSceneTemplateValues,
} from './domain/services/PanelPromptComposer';
export {
    EmittedPanelRecord,
    EmittedSceneRecord,
    toPanelRecord,
    toSceneRecord,
} from './domain/services/SceneRecordMapper';

export { ReversalTransformer, ReversalTransformerOptions } from './application/ReversalTransformer';
export {
    StoryboardOrchestrator,
    StoryboardOrchestratorOptions,
    SceneResult,
    EmittedSceneResult,
    FailedSceneResult,
    ProcessOptions,
    StoryboardRunReport,
} from './application/StoryboardOrchestrator';
export * from './application/pipelines';

export { InMemoryTemplateRepository } from './infrastructure/templates/InMemoryTemplateRepository';
export { loadTemplatesFromDirectory, loadTemplatesWithOverrides } from './infrastructure/templates/TemplateDirectoryLoader';
export { RateLimiter } from './infrastructure/resilience/RateLimiter';
export { OpenAIService, ChatCompletionOptions } from './infrastructure/llm/OpenAIService';
export { ReversalNarrationClient, ReversalNarrationClientOptions } from './infrastructure/llm/ReversalNarrationClient';
