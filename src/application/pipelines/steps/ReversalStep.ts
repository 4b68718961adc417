import { PipelineStep, SceneContext } from '../PipelineInfrastructure';
import { ReversalTransformer } from '../../ReversalTransformer';

export class ReversalStep implements PipelineStep {
    readonly name = 'Reversal';
    readonly stage = 'reversal';

    constructor(private readonly transformer: ReversalTransformer) { }

    async execute(context: SceneContext): Promise<SceneContext> {
        const { scene } = context;
        if (!scene) throw new Error('Validated scene required for reversal');

        const panels = await this.transformer.transform(scene);
        return { ...context, panels };
    }
}
