import {
    IReversalNarrationGenerator,
    ReversalNarrationOptions,
    ReversalNarrationRequest,
} from '../../domain/ports/IReversalNarrationGenerator';
import { TemplateValue } from '../../domain/entities/Template';
import { GenerationError } from '../../domain/errors/StoryboardErrors';
import { renderTemplate } from '../../domain/services/PlaceholderResolver';
import { OpenAIService } from './OpenAIService';
import { REVERSAL_NARRATION_TEMPLATE, REVERSAL_SYSTEM_PROMPT } from './ReversalPrompts';

export interface ReversalNarrationClientOptions {
    temperature?: number;
    /** Used when a panel carries no usable duration */
    defaultDurationSeconds?: number;
}

/**
 * Reversal narration backed by an OpenAI-compatible chat model.
 */
export class ReversalNarrationClient implements IReversalNarrationGenerator {
    private readonly temperature: number;
    private readonly defaultDurationSeconds: number;

    constructor(
        private readonly openAIService: OpenAIService,
        options: ReversalNarrationClientOptions = {}
    ) {
        this.temperature = options.temperature ?? 0.5;
        this.defaultDurationSeconds = options.defaultDurationSeconds ?? 7;
    }

    async generateReversedNarration(
        request: ReversalNarrationRequest,
        options: ReversalNarrationOptions = {}
    ): Promise<string> {
        const prompt = this.buildPrompt(request);
        const response = await this.openAIService.chatCompletion(prompt, REVERSAL_SYSTEM_PROMPT, {
            jsonMode: true,
            temperature: this.temperature,
            signal: options.signal,
        });

        const narration = readNarration(this.openAIService.parseJSON(response));
        if (!narration) {
            throw new GenerationError(
                `No motion_prompt_reversed returned for scene ${request.sceneId} panel ${request.panelIndex}`,
                true
            );
        }

        console.log(`[ReversalNarration] Scene ${request.sceneId} panel ${request.panelIndex}: narration generated (${narration.length} chars)`);
        return narration;
    }

    buildPrompt(request: ReversalNarrationRequest): string {
        const overrides: Record<string, TemplateValue> = {
            visual_start: request.visualStart,
            visual_end: request.visualEnd,
            motion_prompt: request.motionPrompt,
            duration_seconds: request.durationSeconds > 0 ? request.durationSeconds : this.defaultDurationSeconds,
        };
        if (request.lightsAndCamera.trim()) {
            overrides.lights_and_camera = request.lightsAndCamera;
        }

        try {
            return renderTemplate(REVERSAL_NARRATION_TEMPLATE, overrides);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new GenerationError(`Cannot build reversal prompt: ${reason}`);
        }
    }
}

function readNarration(parsed: unknown): string {
    if (typeof parsed === 'object' && parsed !== null && 'motion_prompt_reversed' in parsed) {
        const value = parsed.motion_prompt_reversed;
        return typeof value === 'string' ? value.trim() : '';
    }
    return '';
}
