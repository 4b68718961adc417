/**
 * Storyboard Orchestrator
 *
 * Runs every scene of a batch through the scene pipeline in parallel with a
 * concurrency limit. Scenes share no state: one scene failing never stops
 * the others, and every input scene gets exactly one result.
 */

import { v4 as uuidv4 } from 'uuid';
import { EmittedScene, isPartialScene, isReadyPanel } from '../domain/entities/Scene';
import { SceneError, SchemaError } from '../domain/errors/StoryboardErrors';
import { peekSceneId } from '../domain/services/PanelSchemaValidator';
import {
    PipelineStep,
    SceneContext,
    TemplateWrapRequest,
    contextSceneId,
    createSceneContext,
    executePipeline,
} from './pipelines/PipelineInfrastructure';
import { mapWithConcurrency } from '../infrastructure/resilience/Semaphore';

export interface EmittedSceneResult {
    status: 'emitted';
    sceneId: number;
    position: number;
    scene: EmittedScene;
    durationMs: number;
}

export interface FailedSceneResult {
    status: 'failed';
    sceneId: number | null;
    position: number;
    error: SceneError;
    durationMs: number;
}

export type SceneResult = EmittedSceneResult | FailedSceneResult;

export interface ProcessOptions {
    /** Embed each scene into this template */
    wrap?: TemplateWrapRequest;
    /** Callback for progress updates */
    onProgress?: (completed: number, total: number, current: SceneResult) => void;
}

export interface StoryboardRunReport {
    runId: string;
    startedAt: Date;
    completedAt: Date;
    totalScenes: number;
    /** Scenes emitted with every panel ready */
    emittedCount: number;
    /** Scenes emitted with at least one reversal_failed panel */
    partialCount: number;
    failedCount: number;
    results: SceneResult[];
}

export interface StoryboardOrchestratorOptions {
    /** Maximum scenes in flight (default: 2) */
    sceneConcurrency?: number;
}

export class StoryboardOrchestrator {
    private readonly sceneConcurrency: number;

    constructor(
        private readonly steps: PipelineStep[],
        options: StoryboardOrchestratorOptions = {}
    ) {
        this.sceneConcurrency = options.sceneConcurrency ?? 2;
    }

    /**
     * Processes a batch of raw scenes. Results follow input order.
     */
    async process(rawScenes: readonly unknown[], options: ProcessOptions = {}): Promise<SceneResult[]> {
        const total = rawScenes.length;
        const duplicates = findDuplicateSceneIds(rawScenes);
        let completed = 0;

        return mapWithConcurrency(rawScenes, this.sceneConcurrency, async (raw, position) => {
            const result = await this.processOne(raw, position, duplicates, options.wrap);

            completed++;
            options.onProgress?.(completed, total, result);

            return result;
        });
    }

    /**
     * Processes a batch and summarises the outcome.
     */
    async run(rawScenes: readonly unknown[], options: ProcessOptions = {}): Promise<StoryboardRunReport> {
        const runId = uuidv4();
        const startedAt = new Date();

        console.log(`[Orchestrator] Starting run ${runId} with ${rawScenes.length} scene(s) (concurrency: ${this.sceneConcurrency})`);

        const results = await this.process(rawScenes, options);

        const emitted = results.filter((r): r is EmittedSceneResult => r.status === 'emitted');
        const partialCount = emitted.filter(r => isPartialScene(r.scene)).length;
        const failedCount = results.length - emitted.length;

        console.log(`[Orchestrator] Run ${runId} complete: ${emitted.length - partialCount} emitted, ${partialCount} partial, ${failedCount} failed`);

        return {
            runId,
            startedAt,
            completedAt: new Date(),
            totalScenes: rawScenes.length,
            emittedCount: emitted.length - partialCount,
            partialCount,
            failedCount,
            results,
        };
    }

    private async processOne(
        raw: unknown,
        position: number,
        duplicates: Map<number, number>,
        wrap?: TemplateWrapRequest
    ): Promise<SceneResult> {
        const start = Date.now();
        const sceneId = peekSceneId(raw);

        const occurrences = sceneId === null ? 0 : duplicates.get(sceneId) ?? 0;
        if (sceneId !== null && occurrences > 1) {
            const cause = new SchemaError(sceneId, [`scene_id ${sceneId} appears ${occurrences} times in this run`]);
            return this.failed(new SceneError(sceneId, position, 'validation', cause), start);
        }

        try {
            const context = await executePipeline(createSceneContext(raw, position, wrap), this.steps);
            const scene = toEmittedScene(context);
            return {
                status: 'emitted',
                sceneId: scene.sceneId,
                position,
                scene,
                durationMs: Date.now() - start,
            };
        } catch (error) {
            if (error instanceof SceneError) {
                return this.failed(error, start);
            }
            throw error;
        }
    }

    private failed(error: SceneError, start: number): FailedSceneResult {
        console.error(`[Orchestrator] ${error.message}`);
        return {
            status: 'failed',
            sceneId: error.sceneId,
            position: error.position,
            error,
            durationMs: Date.now() - start,
        };
    }
}

function findDuplicateSceneIds(rawScenes: readonly unknown[]): Map<number, number> {
    const counts = new Map<number, number>();
    for (const raw of rawScenes) {
        const id = peekSceneId(raw);
        if (id !== null) {
            counts.set(id, (counts.get(id) ?? 0) + 1);
        }
    }
    return counts;
}

/**
 * Freezes the pipeline output; emitted scenes are terminal.
 */
function toEmittedScene(context: SceneContext): EmittedScene {
    const { scene, panels } = context;
    if (!scene || !panels) {
        throw new SceneError(contextSceneId(context), context.position, 'reversal', new Error('Scene pipeline produced no panels'));
    }

    const ready = panels.filter(isReadyPanel);
    const references = [...new Set(ready.flatMap(p => p.panel.references))].sort();

    return deepFreeze({
        sceneId: scene.sceneId,
        location: scene.location,
        preActionDescription: scene.preActionDescription,
        panels,
        failedPanelIndexes: panels.filter(p => !isReadyPanel(p)).map(p => p.panel.panelIndex),
        references,
        ...(context.wrappedPrompt !== undefined && { wrappedPrompt: context.wrappedPrompt }),
    });
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        Object.values(value).forEach(deepFreeze);
    }
    return value;
}
