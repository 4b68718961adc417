import { FramePair, Panel, RenderFacingPanel } from '../entities/Scene';

/**
 * Swaps a keyframe pair. Applying it twice returns the original pair.
 */
export function swapRenderFrames(frames: FramePair): FramePair {
    return { start: frames.end, end: frames.start };
}

/**
 * Keyframes the renderer should receive for a panel. Reversed panels are
 * rendered from the authored end back to the authored start, and the clip
 * is played backwards afterwards.
 */
export function renderFramesFor(panel: Panel): FramePair {
    const authored = { start: panel.visualStart, end: panel.visualEnd };
    return panel.isReversed ? swapRenderFrames(authored) : authored;
}

/**
 * Builds the render-facing view of a panel. The narrative panel is not touched.
 */
export function toRenderFacingPanel(panel: Panel): RenderFacingPanel {
    const frames = renderFramesFor(panel);
    return {
        panelIndex: panel.panelIndex,
        renderStart: frames.start,
        renderEnd: frames.end,
        motionPrompt: panel.isReversed && panel.motionPromptReversed
            ? panel.motionPromptReversed
            : panel.motionPrompt,
        isReversed: panel.isReversed,
    };
}
