/**
 * Input for a reversed-playback narration. The authored fields are passed
 * exactly as written (chronological order).
 */
export interface ReversalNarrationRequest {
    sceneId: number;
    panelIndex: number;
    /** Authored chronological motion prompt */
    motionPrompt: string;
    /** Authored chronological start frame */
    visualStart: string;
    /** Authored chronological end frame */
    visualEnd: string;
    lightsAndCamera: string;
    durationSeconds: number;
}

export interface ReversalNarrationOptions {
    /** Aborted when the caller's time budget runs out */
    signal?: AbortSignal;
}

/**
 * Single-purpose text generation capability: describe the clip that plays
 * from the authored end frame back to the authored start frame.
 */
export interface IReversalNarrationGenerator {
    /**
     * @returns the reversed motion description
     * @throws GenerationError when the backend fails
     */
    generateReversedNarration(
        request: ReversalNarrationRequest,
        options?: ReversalNarrationOptions
    ): Promise<string>;
}
