/**
 * Pipeline infrastructure for per-scene processing.
 * Each step has a single responsibility and maps to one failure stage.
 */

import { EmittedPanel, ValidatedScene } from '../../domain/entities/Scene';
import { TemplateValues } from '../../domain/entities/Template';
import { PipelineStage, SceneError, toError } from '../../domain/errors/StoryboardErrors';
import { peekSceneId } from '../../domain/services/PanelSchemaValidator';

/**
 * Asks the pipeline to embed each scene into a stored template.
 */
export interface TemplateWrapRequest {
    templateId: string;
    /** Caller values; keys must be placeholders of the template */
    overrides?: TemplateValues;
}

/**
 * SceneContext carries all state of one scene through the pipeline.
 * Immutable pattern: each step returns a new context.
 */
export interface SceneContext {
    /** Position of the scene in the input batch */
    readonly position: number;
    readonly raw: unknown;
    readonly wrap?: TemplateWrapRequest;

    // Validation
    scene?: ValidatedScene;

    // Reversal
    panels?: EmittedPanel[];

    // Template wrapping
    wrappedPrompt?: string;
}

/**
 * Pipeline step interface.
 * Each step has exactly one responsibility.
 */
export interface PipelineStep {
    readonly name: string;
    /** Stage reported when this step fails */
    readonly stage: PipelineStage;
    execute(context: SceneContext): Promise<SceneContext>;
    shouldSkip?(context: SceneContext): boolean;
}

export function createSceneContext(raw: unknown, position: number, wrap?: TemplateWrapRequest): SceneContext {
    return { raw, position, wrap };
}

/**
 * Scene id of the context, as far as it is known yet.
 */
export function contextSceneId(context: SceneContext): number | null {
    return context.scene?.sceneId ?? peekSceneId(context.raw);
}

/**
 * Executes a pipeline of steps sequentially.
 *
 * @throws SceneError naming the stage of the first failing step
 */
export async function executePipeline(
    context: SceneContext,
    steps: PipelineStep[],
    onStepComplete?: (step: string, context: SceneContext) => void
): Promise<SceneContext> {
    let currentContext = context;

    for (const step of steps) {
        if (step.shouldSkip?.(currentContext)) {
            continue;
        }

        try {
            currentContext = await step.execute(currentContext);
        } catch (error) {
            throw new SceneError(contextSceneId(currentContext), currentContext.position, step.stage, toError(error));
        }

        onStepComplete?.(step.name, currentContext);
    }

    return currentContext;
}
