/**
 * JSON schema of a raw scene record. Structural rules only; ordering and
 * cross-field rules live in PanelSchemaValidator.
 */
export const SCENE_SCHEMA = {
    type: 'object',
    properties: {
        scene_id: { type: 'integer' },
        location: { type: 'string' },
        pre_action_description: { type: 'string' },
        panels: {
            type: 'array',
            minItems: 1,
            items: {
                type: 'object',
                properties: {
                    panel_index: { type: 'integer' },
                    visual_start: { type: 'string', minLength: 1 },
                    visual_end: { type: 'string', minLength: 1 },
                    motion_prompt: { type: 'string', minLength: 1 },
                    is_reversed: { type: 'boolean' },
                    motion_prompt_reversed: { type: 'string' },
                    lights_and_camera: { type: 'string' },
                    dialogue: { type: 'string' },
                    caption: { type: 'string' },
                    duration: { type: 'number', exclusiveMinimum: 0 },
                    references: { type: 'array', items: { type: 'string' } },
                },
                required: [
                    'panel_index',
                    'visual_start',
                    'visual_end',
                    'motion_prompt',
                    'lights_and_camera',
                    'duration',
                ],
            },
        },
    },
    required: ['scene_id', 'location', 'panels'],
};
