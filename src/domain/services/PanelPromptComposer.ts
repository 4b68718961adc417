import { ReadyPanel, Scene } from '../entities/Scene';
import { TemplateValue } from '../entities/Template';

export type GridLayout = 'dual' | 'single';

/**
 * How a scene's panels are laid out for the image model.
 */
export interface StoryboardFormat {
    /** dual: START grid above END grid; single: one frame per panel */
    gridLayout: GridLayout;
    dialogueEnabled: boolean;
    captionsEnabled: boolean;
}

export const DEFAULT_STORYBOARD_FORMAT: StoryboardFormat = {
    gridLayout: 'dual',
    dialogueEnabled: true,
    captionsEnabled: false,
};

const REVERSED_MARKER = '[REVERSED CLIP: rendered START to END, shown to the viewer from END to START]';

/**
 * Renders one ready panel as a block of prompt lines.
 */
export function composePanelBlock(entry: ReadyPanel, format: StoryboardFormat): string {
    const { panel, render } = entry;
    const lines = [`Panel ${panel.panelIndex}:`];
    if (render.isReversed) {
        lines.push(`  ${REVERSED_MARKER}`);
    }

    if (format.gridLayout === 'dual') {
        lines.push(`  START (TOP): ${render.renderStart}`);
        lines.push(`  END (BOTTOM): ${render.renderEnd}`);
        lines.push(`  Motion: ${render.motionPrompt}`);
    } else {
        lines.push(`  Visual: ${render.renderStart}`);
    }

    if (panel.lightsAndCamera) {
        lines.push(`  Camera: ${panel.lightsAndCamera}`);
    }
    if (format.dialogueEnabled && panel.dialogue) {
        lines.push(`  Dialogue: ${panel.dialogue}`);
    }
    if (format.captionsEnabled && panel.caption) {
        lines.push(`  Caption: ${panel.caption}`);
    }

    return lines.join('\n');
}

export function composeLayoutInstruction(panelCount: number, format: StoryboardFormat): string {
    if (format.gridLayout === 'dual') {
        return `Generate a SINGLE image with TWO grids stacked vertically (START frames on top, END frames below), ${panelCount} panels each.`;
    }
    return `Generate a SINGLE image with ${panelCount} panels in a grid layout.`;
}

export function composeCaptionInstruction(format: StoryboardFormat): string {
    return format.captionsEnabled
        ? 'Render each Caption line as on-image text in its panel.'
        : 'NO CAPTIONS!';
}

/**
 * Values a wrapping template may draw from a scene. The orchestrator passes
 * only those the template actually declares.
 */
export function composeSceneTemplateValues(
    scene: Scene,
    readyPanels: ReadyPanel[],
    format: StoryboardFormat
): Record<string, TemplateValue> {
    return {
        scene_id: scene.sceneId,
        location: scene.location,
        setup: scene.preActionDescription,
        layout_instruction: composeLayoutInstruction(readyPanels.length, format),
        caption_instruction: composeCaptionInstruction(format),
        panels: readyPanels.map(entry => composePanelBlock(entry, format)).join('\n\n'),
        panel_count: readyPanels.length,
    };
}
