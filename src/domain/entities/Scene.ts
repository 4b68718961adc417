/**
 * Panel wire record as produced by the scene-breakdown authoring step.
 * Optional fields take their defaults during validation.
 */
export interface RawPanel {
    panel_index: number;
    visual_start: string;
    visual_end: string;
    /** Always written in chronological (narrative) order */
    motion_prompt: string;
    is_reversed?: boolean;
    motion_prompt_reversed?: string;
    lights_and_camera: string;
    dialogue?: string;
    caption?: string;
    /** Seconds */
    duration: number;
    references?: string[];
}

/**
 * Scene wire record: an ordered run of panels sharing one location.
 */
export interface RawScene {
    scene_id: number;
    location: string;
    pre_action_description?: string;
    panels: RawPanel[];
}

/**
 * Panel represents one keyframe pair (roughly 6-8 seconds of video) in its
 * narrative, authored form. Start/end are chronological even when the panel
 * is revealed in reverse.
 */
export interface Panel {
    panelIndex: number;
    visualStart: string;
    visualEnd: string;
    motionPrompt: string;
    isReversed: boolean;
    /** Empty unless the panel is reversed and its narration exists */
    motionPromptReversed: string;
    lightsAndCamera: string;
    dialogue: string;
    caption: string;
    durationSeconds: number;
    references: string[];
}

export interface Scene {
    sceneId: number;
    location: string;
    preActionDescription: string;
    /** Playback order */
    panels: Panel[];
}

/**
 * A scene that passed the schema validator. Only the validator builds these.
 */
export interface ValidatedScene extends Scene {
    readonly validated: true;
}

/**
 * A start/end keyframe pair.
 */
export interface FramePair {
    start: string;
    end: string;
}

/**
 * What the external renderer receives for a panel. For reversed panels the
 * frames are swapped relative to the narrative and the motion prompt is the
 * reversed narration.
 */
export interface RenderFacingPanel {
    panelIndex: number;
    renderStart: string;
    renderEnd: string;
    motionPrompt: string;
    isReversed: boolean;
}

export interface ReadyPanel {
    status: 'ready';
    panel: Panel;
    render: RenderFacingPanel;
}

export interface ReversalFailedPanel {
    status: 'reversal_failed';
    panel: Panel;
    reason: string;
    timedOut: boolean;
    attempts: number;
}

export type EmittedPanel = ReadyPanel | ReversalFailedPanel;

/**
 * Terminal output of the pipeline for one scene.
 */
export interface EmittedScene {
    sceneId: number;
    location: string;
    preActionDescription: string;
    /** Every panel, in playback order, each flagged with its outcome */
    panels: EmittedPanel[];
    /** Panel indexes excluded from rendering because reversal failed */
    failedPanelIndexes: number[];
    /** Unique, sorted reference names used by the ready panels */
    references: string[];
    /** The scene embedded in a wrapping template, when one was requested */
    wrappedPrompt?: string;
}

export function isReadyPanel(panel: EmittedPanel): panel is ReadyPanel {
    return panel.status === 'ready';
}

/**
 * Panels the renderer should receive, in playback order.
 */
export function getRenderablePanels(scene: Pick<EmittedScene, 'panels'>): RenderFacingPanel[] {
    return scene.panels.filter(isReadyPanel).map(p => p.render);
}

/**
 * True when at least one panel was held back from rendering.
 */
export function isPartialScene(scene: Pick<EmittedScene, 'failedPanelIndexes'>): boolean {
    return scene.failedPanelIndexes.length > 0;
}

/**
 * Total on-screen time of the renderable panels in seconds.
 */
export function getSceneDuration(scene: Pick<EmittedScene, 'panels'>): number {
    return scene.panels
        .filter(isReadyPanel)
        .reduce((total, p) => total + p.panel.durationSeconds, 0);
}
