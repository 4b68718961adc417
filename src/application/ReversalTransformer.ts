/**
 * Reversal Transformer
 *
 * Applies the reversed-reveal pass to a validated scene: swaps the
 * render-facing keyframes of reversed panels and asks the narration
 * generator for the reversed motion prompt. A failing panel is flagged
 * reversal_failed; the rest of the scene is unaffected.
 */

import { EmittedPanel, Panel, ValidatedScene } from '../domain/entities/Scene';
import { IReversalNarrationGenerator } from '../domain/ports/IReversalNarrationGenerator';
import { GenerationError, GenerationTimeoutError } from '../domain/errors/StoryboardErrors';
import { toRenderFacingPanel } from '../domain/services/FrameReversal';
import { RetryExhaustedError, withRetry, withTimeout } from '../infrastructure/resilience/RetryUtils';
import { mapWithConcurrency } from '../infrastructure/resilience/Semaphore';
import { RateLimiter } from '../infrastructure/resilience/RateLimiter';

export interface ReversalTransformerOptions {
    /** Time budget for one generator call (default: 60000) */
    timeoutMs?: number;
    /** Attempts per panel including the first (default: 2) */
    maxAttempts?: number;
    /** Delay before the retry (default: 1000) */
    initialBackoffMs?: number;
    /** Generator calls in flight per scene (default: 4) */
    panelConcurrency?: number;
    /** Shared limiter taken before every generator call, retries included */
    rateLimiter?: RateLimiter;
}

export class ReversalTransformer {
    private readonly timeoutMs: number;
    private readonly maxAttempts: number;
    private readonly initialBackoffMs: number;
    private readonly panelConcurrency: number;
    private readonly rateLimiter?: RateLimiter;

    constructor(
        private readonly generator: IReversalNarrationGenerator,
        options: ReversalTransformerOptions = {}
    ) {
        this.timeoutMs = options.timeoutMs ?? 60000;
        this.maxAttempts = options.maxAttempts ?? 2;
        this.initialBackoffMs = options.initialBackoffMs ?? 1000;
        this.panelConcurrency = options.panelConcurrency ?? 4;
        this.rateLimiter = options.rateLimiter;
    }

    /**
     * Transforms every panel of the scene. Results keep playback order.
     */
    async transform(scene: ValidatedScene): Promise<EmittedPanel[]> {
        const reversedCount = scene.panels.filter(p => p.isReversed).length;
        if (reversedCount > 0) {
            console.log(`[Reversal] Scene ${scene.sceneId}: ${reversedCount} reversed panel(s)`);
        }

        return mapWithConcurrency(scene.panels, this.panelConcurrency, panel =>
            this.transformPanel(scene.sceneId, panel)
        );
    }

    async transformPanel(sceneId: number, panel: Panel): Promise<EmittedPanel> {
        if (!panel.isReversed || panel.motionPromptReversed) {
            return readyPanel(panel);
        }

        try {
            const narration = await withRetry(
                async () => {
                    await this.rateLimiter?.acquire();
                    const text = await withTimeout(signal => this.generator.generateReversedNarration({
                        sceneId,
                        panelIndex: panel.panelIndex,
                        motionPrompt: panel.motionPrompt,
                        visualStart: panel.visualStart,
                        visualEnd: panel.visualEnd,
                        lightsAndCamera: panel.lightsAndCamera,
                        durationSeconds: panel.durationSeconds,
                    }, { signal }), this.timeoutMs);
                    if (!text.trim()) {
                        throw new GenerationError('Generator returned an empty narration', true);
                    }
                    return text.trim();
                },
                {
                    maxAttempts: this.maxAttempts,
                    initialBackoffMs: this.initialBackoffMs,
                    isRetryable: isRetryableGenerationFailure,
                    onRetry: (attempt, error, delayMs) => {
                        console.warn(`[Reversal] Scene ${sceneId} panel ${panel.panelIndex}: attempt ${attempt} failed (${describe(error)}), retrying in ${Math.round(delayMs)}ms`);
                    },
                }
            );

            return readyPanel({ ...panel, motionPromptReversed: narration });
        } catch (error) {
            const cause = error instanceof RetryExhaustedError ? error.lastError : error;
            const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
            console.warn(`[Reversal] Scene ${sceneId} panel ${panel.panelIndex}: reversal failed after ${attempts} attempt(s): ${describe(cause)}`);
            return {
                status: 'reversal_failed',
                panel,
                reason: describe(cause),
                timedOut: cause instanceof GenerationTimeoutError,
                attempts,
            };
        }
    }
}

function readyPanel(panel: Panel): EmittedPanel {
    return { status: 'ready', panel, render: toRenderFacingPanel(panel) };
}

/**
 * GenerationErrors carry their own retry hint; other errors are retried.
 */
function isRetryableGenerationFailure(error: unknown): boolean {
    return error instanceof GenerationError ? error.retryable : true;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
