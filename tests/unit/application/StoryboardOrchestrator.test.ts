import { StoryboardOrchestrator, SceneResult, EmittedSceneResult, FailedSceneResult } from '../../../src/application/StoryboardOrchestrator';
import { ReversalTransformer, ReversalTransformerOptions } from '../../../src/application/ReversalTransformer';
import { createScenePipeline } from '../../../src/application/pipelines/ScenePipeline';
import { IReversalNarrationGenerator, ReversalNarrationRequest } from '../../../src/domain/ports/IReversalNarrationGenerator';
import { PanelSchemaValidator } from '../../../src/domain/services/PanelSchemaValidator';
import { PlaceholderResolver } from '../../../src/domain/services/PlaceholderResolver';
import { toSceneRecord } from '../../../src/domain/services/SceneRecordMapper';
import { InMemoryTemplateRepository } from '../../../src/infrastructure/templates/InMemoryTemplateRepository';
import { PromptTemplate } from '../../../src/domain/entities/Template';
import {
    SchemaError,
    UnknownPlaceholderError,
    UnknownTemplateError,
} from '../../../src/domain/errors/StoryboardErrors';
import { hedgehogScene, rawPanel, rawScene } from '../../fixtures/scenes';

const NARRATION = 'At 0 seconds the knife glints. By 7 seconds the fog has swallowed the hedgehog.';

const GRID_TEMPLATE: PromptTemplate = {
    id: 'grid',
    body: 'Scene {{scene_id}} at {{location}} ({{mood}})\n{{panels}}',
    defaults: { mood: 'calm' },
};

function emitted(result: SceneResult): EmittedSceneResult {
    if (result.status !== 'emitted') {
        throw new Error(`Scene at position ${result.position} failed: ${result.error.message}`);
    }
    return result;
}

function failed(result: SceneResult): FailedSceneResult {
    if (result.status !== 'failed') {
        throw new Error(`Scene at position ${result.position} did not fail`);
    }
    return result;
}

function hangUntilAborted(_request: ReversalNarrationRequest, options?: { signal?: AbortSignal }): Promise<string> {
    return new Promise((_resolve, reject) => {
        options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
}

describe('StoryboardOrchestrator', () => {
    let generator: jest.Mocked<IReversalNarrationGenerator>;

    function buildOrchestrator(transformerOptions: ReversalTransformerOptions = {}): StoryboardOrchestrator {
        const steps = createScenePipeline({
            validator: new PanelSchemaValidator(),
            transformer: new ReversalTransformer(generator, { initialBackoffMs: 1, ...transformerOptions }),
            resolver: new PlaceholderResolver(new InMemoryTemplateRepository([GRID_TEMPLATE])),
        });
        return new StoryboardOrchestrator(steps, { sceneConcurrency: 2 });
    }

    beforeEach(() => {
        generator = {
            generateReversedNarration: jest.fn().mockResolvedValue(NARRATION),
        };
    });

    describe('process', () => {
        it('should emit a reversed reveal with swapped render frames', async () => {
            const [result] = await buildOrchestrator().process([hedgehogScene()]);
            const record = toSceneRecord(emitted(result).scene);

            expect(record.panels[1]).toMatchObject({
                panel_index: 2,
                visual_start: 'fog fills the frame',
                visual_end: 'hedgehog holds a knife',
                motion_prompt: 'hedgehog emerges from the fog gripping a knife.',
                motion_prompt_reversed: NARRATION,
                render_start: 'hedgehog holds a knife',
                render_end: 'fog fills the frame',
                reversal_failed: false,
            });
            expect(record.references).toEqual(['forest', 'hedgehog']);
        });

        it('should emit a partial scene when a reversal times out', async () => {
            generator.generateReversedNarration.mockImplementation(hangUntilAborted);

            const [result] = await buildOrchestrator({ timeoutMs: 20 }).process([hedgehogScene()]);
            const scene = emitted(result).scene;

            expect(scene.failedPanelIndexes).toEqual([2]);
            expect(scene.panels.map(p => p.status)).toEqual(['ready', 'reversal_failed', 'ready']);
            expect(toSceneRecord(scene).panels[1]).toMatchObject({
                render_start: null,
                render_end: null,
                reversal_failed: true,
                reversal_error: 'Reversal narration timed out after 20ms',
            });
        });

        it('should isolate an invalid scene from the rest of the batch', async () => {
            const invalid = rawScene({
                scene_id: 2,
                panels: [rawPanel({ panel_index: 3 }), rawPanel({ panel_index: 3 })],
            });

            const results = await buildOrchestrator().process([
                hedgehogScene(1),
                invalid,
                hedgehogScene(3),
            ]);

            expect(results.map(r => r.status)).toEqual(['emitted', 'failed', 'emitted']);
            const failure = failed(results[1]);
            expect(failure.sceneId).toBe(2);
            expect(failure.position).toBe(1);
            expect(failure.error.stage).toBe('validation');
            expect(failure.error.cause).toBeInstanceOf(SchemaError);
            expect(failure.error.message).toBe(
                'Scene 2 failed during validation: Scene 2 failed validation: panel_index 3 is used more than once'
            );
        });

        it('should name the position when the scene id cannot be read', async () => {
            const [result] = await buildOrchestrator().process([{ location: 'Nowhere' }]);
            const failure = failed(result);

            expect(failure.sceneId).toBeNull();
            expect(failure.error.message.startsWith('Scene #0 failed during validation:')).toBe(true);
        });

        it('should fail every scene that shares a scene_id', async () => {
            const results = await buildOrchestrator().process([
                hedgehogScene(5),
                hedgehogScene(6),
                hedgehogScene(5),
            ]);

            expect(results.map(r => r.status)).toEqual(['failed', 'emitted', 'failed']);
            expect(failed(results[0]).error.cause.message).toBe(
                'Scene 5 failed validation: scene_id 5 appears 2 times in this run'
            );
            expect(generator.generateReversedNarration).toHaveBeenCalledTimes(1);
        });

        it('should keep input order when later scenes finish first', async () => {
            generator.generateReversedNarration.mockImplementation(request =>
                new Promise<string>(resolve => setTimeout(() => resolve(NARRATION), request.sceneId === 1 ? 30 : 1))
            );

            const results = await buildOrchestrator().process([hedgehogScene(1), hedgehogScene(2)]);

            expect(results.map(r => r.sceneId)).toEqual([1, 2]);
        });

        it('should report progress once per scene', async () => {
            const onProgress = jest.fn();

            await buildOrchestrator().process([hedgehogScene(1), hedgehogScene(2)], { onProgress });

            expect(onProgress).toHaveBeenCalledTimes(2);
            expect(onProgress).toHaveBeenLastCalledWith(2, 2, expect.objectContaining({ status: 'emitted' }));
        });

        it('should leave motion_prompt_reversed empty on every forward panel', async () => {
            const [result] = await buildOrchestrator().process([rawScene({
                panels: [
                    rawPanel({ panel_index: 1 }),
                    rawPanel({ panel_index: 2, is_reversed: true }),
                    rawPanel({ panel_index: 3, motion_prompt_reversed: '   ' }),
                ],
            })]);
            const record = toSceneRecord(emitted(result).scene);
            const forward = record.panels.filter(panel => !panel.is_reversed);

            expect(forward.map(panel => panel.panel_index)).toEqual([1, 3]);
            expect(forward.map(panel => panel.motion_prompt_reversed)).toEqual(['', '']);
            expect(record.panels[1].motion_prompt_reversed).toBe(NARRATION);
        });

        it('should narrate a reversed panel whose motion prompt contains brace tokens', async () => {
            const [result] = await buildOrchestrator().process([rawScene({
                panels: [rawPanel({ is_reversed: true, motion_prompt: 'Neon sign flickers {{OPEN}} then dies.' })],
            })]);
            const record = toSceneRecord(emitted(result).scene);

            expect(generator.generateReversedNarration).toHaveBeenCalledTimes(1);
            expect(record.panels[0]).toMatchObject({
                motion_prompt: 'Neon sign flickers {{OPEN}} then dies.',
                motion_prompt_reversed: NARRATION,
                reversal_failed: false,
            });
        });

        it('should freeze emitted scenes', async () => {
            const [result] = await buildOrchestrator().process([hedgehogScene()]);
            const scene = emitted(result).scene;

            expect(Object.isFrozen(scene)).toBe(true);
            expect(Object.isFrozen(scene.panels)).toBe(true);
            expect(Object.isFrozen(scene.panels[1].panel)).toBe(true);
        });
    });

    describe('template wrapping', () => {
        it('should embed the scene into the requested template', async () => {
            const [result] = await buildOrchestrator().process([rawScene({ scene_id: 11 })], {
                wrap: { templateId: 'grid', overrides: { mood: 'tense' } },
            });

            expect(emitted(result).scene.wrappedPrompt).toBe([
                'Scene 11 at Harbour at night (tense)',
                'Panel 1:',
                '  START (TOP): A lantern flickers on an empty pier',
                '  END (BOTTOM): The lantern gutters out',
                '  Motion: Wind pushes the flame sideways until it dies.',
                '  Camera: Low angle, tungsten practicals.',
            ].join('\n'));
        });

        it('should carry brace tokens in panel text into the wrapped prompt verbatim', async () => {
            const [result] = await buildOrchestrator().process([rawScene({
                panels: [rawPanel({ dialogue: 'KID: {{whispers}} run!' })],
            })], { wrap: { templateId: 'grid' } });

            expect(emitted(result).scene.wrappedPrompt).toContain('  Dialogue: KID: {{whispers}} run!');
        });

        it('should leave failed panels out of the wrapped prompt', async () => {
            generator.generateReversedNarration.mockImplementation(hangUntilAborted);

            const [result] = await buildOrchestrator({ timeoutMs: 20, maxAttempts: 1 }).process([hedgehogScene()], {
                wrap: { templateId: 'grid' },
            });
            const wrapped = emitted(result).scene.wrappedPrompt ?? '';

            expect(wrapped.startsWith('Scene 7 at Misty forest clearing (calm)\nPanel 1:')).toBe(true);
            expect(wrapped).not.toContain('Panel 2:');
            expect(wrapped).toContain('Panel 3:');
        });

        it('should fail the scene on an unknown template', async () => {
            const [result] = await buildOrchestrator().process([rawScene()], { wrap: { templateId: 'missing' } });
            const failure = failed(result);

            expect(failure.error.stage).toBe('template');
            expect(failure.error.cause).toBeInstanceOf(UnknownTemplateError);
        });

        it('should fail the scene on an override the template does not declare', async () => {
            const [result] = await buildOrchestrator().process([rawScene()], {
                wrap: { templateId: 'grid', overrides: { weather: 'rain' } },
            });

            expect(failed(result).error.cause).toBeInstanceOf(UnknownPlaceholderError);
        });
    });

    describe('run', () => {
        it('should summarise emitted, partial and failed scenes', async () => {
            generator.generateReversedNarration.mockImplementation((request, options) =>
                request.sceneId === 2 ? hangUntilAborted(request, options) : Promise.resolve(NARRATION)
            );

            const report = await buildOrchestrator({ timeoutMs: 20, maxAttempts: 1 }).run([
                hedgehogScene(1),
                hedgehogScene(2),
                rawScene({ scene_id: 3, panels: [] }),
            ]);

            expect(report.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
            expect(report.totalScenes).toBe(3);
            expect(report.emittedCount).toBe(1);
            expect(report.partialCount).toBe(1);
            expect(report.failedCount).toBe(1);
            expect(report.completedAt.getTime()).toBeGreaterThanOrEqual(report.startedAt.getTime());
        });
    });
});
