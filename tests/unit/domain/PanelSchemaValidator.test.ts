import { PanelSchemaValidator, peekSceneId } from '../../../src/domain/services/PanelSchemaValidator';
import { SchemaError } from '../../../src/domain/errors/StoryboardErrors';
import { hedgehogScene, rawPanel, rawScene } from '../../fixtures/scenes';

function schemaErrorOf(validator: PanelSchemaValidator, raw: unknown): SchemaError {
    try {
        validator.validate(raw);
    } catch (error) {
        if (error instanceof SchemaError) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected validation to fail');
}

describe('PanelSchemaValidator', () => {
    const validator = new PanelSchemaValidator();

    describe('validate', () => {
        it('should map a valid scene and apply defaults', () => {
            const scene = validator.validate(rawScene());

            expect(scene.validated).toBe(true);
            expect(scene.sceneId).toBe(1);
            expect(scene.panels).toEqual([{
                panelIndex: 1,
                visualStart: 'A lantern flickers on an empty pier',
                visualEnd: 'The lantern gutters out',
                motionPrompt: 'Wind pushes the flame sideways until it dies.',
                isReversed: false,
                motionPromptReversed: '',
                lightsAndCamera: 'Low angle, tungsten practicals.',
                dialogue: '',
                caption: '',
                durationSeconds: 7,
                references: [],
            }]);
        });

        it('should default a missing pre_action_description to empty text', () => {
            const raw = rawScene();
            delete raw.pre_action_description;

            expect(validator.validate(raw).preActionDescription).toBe('');
        });

        it('should keep a reversed panel in narrative order', () => {
            const scene = validator.validate(hedgehogScene());
            const reversed = scene.panels[1];

            expect(reversed.isReversed).toBe(true);
            expect(reversed.visualStart).toBe('fog fills the frame');
            expect(reversed.visualEnd).toBe('hedgehog holds a knife');
        });

        it('should reject a duplicate panel_index', () => {
            const raw = rawScene({
                scene_id: 4,
                panels: [
                    rawPanel({ panel_index: 1 }),
                    rawPanel({ panel_index: 2 }),
                    rawPanel({ panel_index: 3 }),
                    rawPanel({ panel_index: 3 }),
                ],
            });

            const error = schemaErrorOf(validator, raw);

            expect(error.sceneId).toBe(4);
            expect(error.issues).toEqual(['panel_index 3 is used more than once']);
        });

        it('should reject panels out of playback order', () => {
            const raw = rawScene({
                panels: [rawPanel({ panel_index: 2 }), rawPanel({ panel_index: 1 })],
            });

            expect(schemaErrorOf(validator, raw).issues).toEqual([
                'panel_index 1 at position 1 does not follow 2',
            ]);
        });

        it('should reject a zero duration', () => {
            const raw = rawScene({ panels: [rawPanel({ duration: 0 })] });

            expect(schemaErrorOf(validator, raw).issues).toEqual(['/panels/0/duration must be > 0']);
        });

        it('should reject a scene without panels', () => {
            const raw = rawScene({ panels: [] });

            expect(schemaErrorOf(validator, raw).issues).toEqual(['/panels must NOT have fewer than 1 items']);
        });

        it('should reject an empty visual description', () => {
            const raw = rawScene({ panels: [rawPanel({ visual_end: '' })] });

            expect(schemaErrorOf(validator, raw).issues).toEqual([
                '/panels/0/visual_end must NOT have fewer than 1 characters',
            ]);
        });

        it('should report every structural problem at once', () => {
            const error = schemaErrorOf(validator, { scene_id: 9, panels: [{ panel_index: 1 }] });

            expect(error.sceneId).toBe(9);
            expect(error.issues).toContain("/ must have required property 'location'");
            expect(error.issues).toContain("/panels/0 must have required property 'visual_start'");
            expect(error.issues).toContain("/panels/0 must have required property 'duration'");
        });

        it('should reject a reversed narration on a forward panel', () => {
            const raw = rawScene({
                panels: [rawPanel({ motion_prompt_reversed: 'Flame relights itself.' })],
            });

            expect(schemaErrorOf(validator, raw).issues).toEqual([
                'panel 1 has motion_prompt_reversed but is not reversed',
            ]);
        });

        it('should keep a pre-populated reversed narration, trimmed', () => {
            const raw = rawScene({
                panels: [rawPanel({ is_reversed: true, motion_prompt_reversed: '  Flame relights itself.  ' })],
            });

            expect(validator.validate(raw).panels[0].motionPromptReversed).toBe('Flame relights itself.');
        });

        it('should report a scene that is not an object without an id', () => {
            const error = schemaErrorOf(validator, 'not a scene');

            expect(error.sceneId).toBeNull();
            expect(error.issues).toEqual(['/ must be object']);
        });
    });

    describe('peekSceneId', () => {
        it('should read an integer scene_id', () => {
            expect(peekSceneId({ scene_id: 12 })).toBe(12);
        });

        it('should ignore ids that are not integers', () => {
            expect(peekSceneId({ scene_id: '12' })).toBeNull();
            expect(peekSceneId({ scene_id: 1.5 })).toBeNull();
            expect(peekSceneId(null)).toBeNull();
        });
    });
});
