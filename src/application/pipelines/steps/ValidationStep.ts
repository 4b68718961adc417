import { PipelineStep, SceneContext } from '../PipelineInfrastructure';
import { PanelSchemaValidator } from '../../../domain/services/PanelSchemaValidator';

export class ValidationStep implements PipelineStep {
    readonly name = 'Validation';
    readonly stage = 'validation';

    constructor(private readonly validator: PanelSchemaValidator) { }

    async execute(context: SceneContext): Promise<SceneContext> {
        const scene = this.validator.validate(context.raw);
        return { ...context, scene };
    }
}
