/**
 * Base class for every error raised by the storyboard pipeline.
 * `code` is stable and safe to match on; `message` is for humans.
 */
export class StoryboardError extends Error {
    constructor(
        public readonly code: string,
        message: string
    ) {
        super(message);
        this.name = 'StoryboardError';
    }
}

/**
 * Requested template id is not in the store.
 */
export class UnknownTemplateError extends StoryboardError {
    constructor(public readonly templateId: string) {
        super('UNKNOWN_TEMPLATE', `Unknown template: ${templateId}`);
        this.name = 'UnknownTemplateError';
    }
}

/**
 * Override keys that the template body never references.
 */
export class UnknownPlaceholderError extends StoryboardError {
    constructor(
        public readonly templateId: string,
        public readonly placeholders: string[]
    ) {
        super(
            'UNKNOWN_PLACEHOLDER',
            `Template "${templateId}" has no placeholder(s): ${placeholders.join(', ')}`
        );
        this.name = 'UnknownPlaceholderError';
    }
}

/**
 * Placeholders with neither an override nor a default.
 */
export class MissingPlaceholderValueError extends StoryboardError {
    constructor(
        public readonly templateId: string,
        public readonly placeholders: string[]
    ) {
        super(
            'MISSING_PLACEHOLDER_VALUE',
            `Template "${templateId}" is missing value(s) for: ${placeholders.join(', ')}`
        );
        this.name = 'MissingPlaceholderValueError';
    }
}

/**
 * Tokens still present after substitution.
 */
export class UnresolvedTokenError extends StoryboardError {
    constructor(
        public readonly templateId: string,
        public readonly tokens: string[]
    ) {
        super(
            'UNRESOLVED_TOKEN',
            `Template "${templateId}" left unresolved token(s): ${tokens.join(', ')}`
        );
        this.name = 'UnresolvedTokenError';
    }
}

/**
 * A template definition is inconsistent (duplicate id, default for a
 * placeholder the body does not use, unreadable defaults table).
 */
export class TemplateDefinitionError extends StoryboardError {
    constructor(
        public readonly templateId: string,
        message: string
    ) {
        super('TEMPLATE_DEFINITION', `Template "${templateId}": ${message}`);
        this.name = 'TemplateDefinitionError';
    }
}

/**
 * A raw scene failed validation. The whole scene is rejected.
 */
export class SchemaError extends StoryboardError {
    constructor(
        public readonly sceneId: number | null,
        public readonly issues: string[]
    ) {
        super(
            'SCHEMA_ERROR',
            `Scene ${sceneId ?? '(unknown)'} failed validation: ${issues.join('; ')}`
        );
        this.name = 'SchemaError';
    }
}

/**
 * The reversal narration backend failed for a single panel.
 */
export class GenerationError extends StoryboardError {
    constructor(
        message: string,
        public readonly retryable: boolean = false,
        public readonly statusCode?: number
    ) {
        super('GENERATION_ERROR', message);
        this.name = 'GenerationError';
    }
}

/**
 * The reversal narration call did not finish within its time budget.
 */
export class GenerationTimeoutError extends GenerationError {
    constructor(public readonly timeoutMs: number) {
        super(`Reversal narration timed out after ${timeoutMs}ms`, true);
        this.name = 'GenerationTimeoutError';
    }
}

export type PipelineStage = 'validation' | 'reversal' | 'template';

/**
 * Terminal failure of one scene. Other scenes in the run are unaffected.
 */
export class SceneError extends StoryboardError {
    constructor(
        public readonly sceneId: number | null,
        public readonly position: number,
        public readonly stage: PipelineStage,
        public readonly cause: Error
    ) {
        super('SCENE_ERROR', `Scene ${sceneId ?? `#${position}`} failed during ${stage}: ${cause.message}`);
        this.name = 'SceneError';
    }
}

/**
 * Normalises anything thrown into an Error.
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(String(value));
}
