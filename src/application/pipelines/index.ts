export {
    PipelineStep,
    SceneContext,
    TemplateWrapRequest,
    createSceneContext,
    executePipeline,
} from './PipelineInfrastructure';
export { createScenePipeline, ScenePipelineDependencies } from './ScenePipeline';
export { ValidationStep } from './steps/ValidationStep';
export { ReversalStep } from './steps/ReversalStep';
export { TemplateWrapStep } from './steps/TemplateWrapStep';
