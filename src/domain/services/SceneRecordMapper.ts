import { EmittedPanel, EmittedScene } from '../entities/Scene';

/**
 * Panel wire record handed to the renderer. The authored fields keep their
 * chronological values; render_start/render_end carry the render order.
 */
export interface EmittedPanelRecord {
    panel_index: number;
    visual_start: string;
    visual_end: string;
    motion_prompt: string;
    is_reversed: boolean;
    motion_prompt_reversed: string;
    lights_and_camera: string;
    dialogue: string;
    caption: string;
    duration: number;
    references: string[];
    /** null when the panel is held back */
    render_start: string | null;
    render_end: string | null;
    reversal_failed: boolean;
    reversal_error: string | null;
}

export interface EmittedSceneRecord {
    scene_id: number;
    location: string;
    pre_action_description: string;
    panels: EmittedPanelRecord[];
    references: string[];
    wrapped_prompt: string | null;
}

export function toPanelRecord(entry: EmittedPanel): EmittedPanelRecord {
    const { panel } = entry;
    return {
        panel_index: panel.panelIndex,
        visual_start: panel.visualStart,
        visual_end: panel.visualEnd,
        motion_prompt: panel.motionPrompt,
        is_reversed: panel.isReversed,
        motion_prompt_reversed: panel.motionPromptReversed,
        lights_and_camera: panel.lightsAndCamera,
        dialogue: panel.dialogue,
        caption: panel.caption,
        duration: panel.durationSeconds,
        references: [...panel.references],
        render_start: entry.status === 'ready' ? entry.render.renderStart : null,
        render_end: entry.status === 'ready' ? entry.render.renderEnd : null,
        reversal_failed: entry.status === 'reversal_failed',
        reversal_error: entry.status === 'reversal_failed' ? entry.reason : null,
    };
}

export function toSceneRecord(scene: EmittedScene): EmittedSceneRecord {
    return {
        scene_id: scene.sceneId,
        location: scene.location,
        pre_action_description: scene.preActionDescription,
        panels: scene.panels.map(toPanelRecord),
        references: [...scene.references],
        wrapped_prompt: scene.wrappedPrompt ?? null,
    };
}
