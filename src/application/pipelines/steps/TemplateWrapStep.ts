import { PipelineStep, SceneContext } from '../PipelineInfrastructure';
import { isReadyPanel } from '../../../domain/entities/Scene';
import { TemplateValue } from '../../../domain/entities/Template';
import { PlaceholderResolver } from '../../../domain/services/PlaceholderResolver';
import { StoryboardFormat, composeSceneTemplateValues } from '../../../domain/services/PanelPromptComposer';

/**
 * Embeds the scene into the requested template. Scene-derived values are
 * offered only for placeholders the template declares; caller overrides win.
 */
export class TemplateWrapStep implements PipelineStep {
    readonly name = 'TemplateWrap';
    readonly stage = 'template';

    constructor(
        private readonly resolver: PlaceholderResolver,
        private readonly format: StoryboardFormat
    ) { }

    shouldSkip(context: SceneContext): boolean {
        return !context.wrap;
    }

    async execute(context: SceneContext): Promise<SceneContext> {
        const { scene, panels, wrap } = context;
        if (!wrap) return context;
        if (!scene || !panels) throw new Error('Transformed scene required for template wrapping');

        const declared = this.resolver.placeholdersOf(wrap.templateId);
        const sceneValues = composeSceneTemplateValues(scene, panels.filter(isReadyPanel), this.format);

        const values: Record<string, TemplateValue> = {};
        for (const [name, value] of Object.entries(sceneValues)) {
            if (declared.includes(name)) {
                values[name] = value;
            }
        }

        const wrappedPrompt = this.resolver.resolve(wrap.templateId, { ...values, ...wrap.overrides });
        return { ...context, wrappedPrompt };
    }
}
