import { PromptTemplate } from '../../domain/entities/Template';

export const REVERSAL_SYSTEM_PROMPT = `You are a Master Cinematographer writing motion prompts for AI image-to-video models.
You prepare assets for automated tools: be specific, physically plausible and precise. Respond with JSON only.`;

/**
 * Prompt for the narration of a reversed-reveal clip. The clip is generated
 * forwards from the authored END frame to the authored START frame and
 * reversed in post-production, so the viewer sees the action chronologically.
 */
export const REVERSAL_NARRATION_TEMPLATE: PromptTemplate = {
    id: 'reversal-narration',
    description: 'Motion prompt for a clip that is rendered backwards and reversed in post',
    body: `This panel is a REVERSE REVEAL. The action below is written in chronological order,
but the video model must generate the clip backwards:

- The generated clip STARTS on: {{visual_end}}
- The generated clip ENDS on: {{visual_start}}

Chronological action, as the viewer will finally see it:
{{motion_prompt}}

Lights and camera:
{{lights_and_camera}}

Write motion_prompt_reversed: the motion of the generated clip, going FROM its start frame TO its end frame.
The finished clip is played in reverse, so the viewer sees the chronological action.

Rules:
- The motion must be physically plausible as a forward-playing clip.
- Duration: {{duration_seconds}} seconds total. Use timestamps (e.g. "At 2 seconds...").
- Be very detailed (100+ words).
- Do NOT invent new elements; only describe the transition between the two frames.
- Preserve the lighting and camera details.

Respond with a JSON object:
{
  "motion_prompt_reversed": "..."
}`,
    defaults: {
        lights_and_camera: 'Static camera, natural light.',
        duration_seconds: 7,
    },
};
