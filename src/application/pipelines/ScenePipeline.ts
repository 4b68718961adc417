import { PipelineStep } from './PipelineInfrastructure';
import { ValidationStep } from './steps/ValidationStep';
import { ReversalStep } from './steps/ReversalStep';
import { TemplateWrapStep } from './steps/TemplateWrapStep';
import { ReversalTransformer } from '../ReversalTransformer';
import { PanelSchemaValidator } from '../../domain/services/PanelSchemaValidator';
import { PlaceholderResolver } from '../../domain/services/PlaceholderResolver';
import { DEFAULT_STORYBOARD_FORMAT, StoryboardFormat } from '../../domain/services/PanelPromptComposer';

export interface ScenePipelineDependencies {
    validator: PanelSchemaValidator;
    transformer: ReversalTransformer;
    resolver: PlaceholderResolver;
    /** Defaults to a dual grid with dialogue and without captions */
    format?: StoryboardFormat;
}

export function createScenePipeline(deps: ScenePipelineDependencies): PipelineStep[] {
    return [
        // 1. Schema validation (rejects the whole scene)
        new ValidationStep(deps.validator),

        // 2. Reversed reveal (per-panel failures are recovered)
        new ReversalStep(deps.transformer),

        // 3. Optional template wrapping
        new TemplateWrapStep(deps.resolver, deps.format ?? DEFAULT_STORYBOARD_FORMAT),
    ];
}
