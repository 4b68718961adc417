import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { Panel, RawPanel, RawScene, ValidatedScene } from '../entities/Scene';
import { SchemaError } from '../errors/StoryboardErrors';
import { SCENE_SCHEMA } from './sceneSchema';

/**
 * Validates raw scene records and maps them to domain scenes.
 *
 * Rejects the whole scene on any problem; every issue found is reported,
 * not just the first.
 */
export class PanelSchemaValidator {
    private readonly validateShape: ValidateFunction<RawScene>;

    constructor() {
        const ajv = new Ajv({ allErrors: true });
        this.validateShape = ajv.compile<RawScene>(SCENE_SCHEMA);
    }

    validate(raw: unknown): ValidatedScene {
        if (!this.validateShape(raw)) {
            throw new SchemaError(peekSceneId(raw), formatAjvErrors(this.validateShape.errors));
        }

        const issues = [
            ...checkPanelOrder(raw.panels),
            ...checkReversedPrompts(raw.panels),
        ];
        if (issues.length > 0) {
            throw new SchemaError(raw.scene_id, issues);
        }

        return {
            sceneId: raw.scene_id,
            location: raw.location,
            preActionDescription: raw.pre_action_description ?? '',
            panels: raw.panels.map(toPanel),
            validated: true,
        };
    }
}

function checkPanelOrder(panels: RawPanel[]): string[] {
    const issues: string[] = [];
    const seen = new Set<number>();

    panels.forEach((panel, position) => {
        if (seen.has(panel.panel_index)) {
            issues.push(`panel_index ${panel.panel_index} is used more than once`);
        } else if (position > 0 && panel.panel_index <= panels[position - 1].panel_index) {
            issues.push(
                `panel_index ${panel.panel_index} at position ${position} does not follow ${panels[position - 1].panel_index}`
            );
        }
        seen.add(panel.panel_index);
    });

    return issues;
}

function checkReversedPrompts(panels: RawPanel[]): string[] {
    return panels
        .filter(panel => panel.is_reversed !== true && (panel.motion_prompt_reversed ?? '').trim() !== '')
        .map(panel => `panel ${panel.panel_index} has motion_prompt_reversed but is not reversed`);
}

function toPanel(raw: RawPanel): Panel {
    return {
        panelIndex: raw.panel_index,
        visualStart: raw.visual_start,
        visualEnd: raw.visual_end,
        motionPrompt: raw.motion_prompt,
        isReversed: raw.is_reversed ?? false,
        motionPromptReversed: (raw.motion_prompt_reversed ?? '').trim(),
        lightsAndCamera: raw.lights_and_camera,
        dialogue: raw.dialogue ?? '',
        caption: raw.caption ?? '',
        durationSeconds: raw.duration,
        references: [...(raw.references ?? [])],
    };
}

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
    if (!errors || errors.length === 0) {
        return ['scene does not match the scene schema'];
    }
    return errors.map(error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);
}

/**
 * Best-effort scene id of a record that may not be a valid scene.
 */
export function peekSceneId(raw: unknown): number | null {
    if (typeof raw === 'object' && raw !== null && 'scene_id' in raw) {
        const id = raw.scene_id;
        return typeof id === 'number' && Number.isInteger(id) ? id : null;
    }
    return null;
}
