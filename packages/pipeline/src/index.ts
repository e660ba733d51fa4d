export type {ExecuteRequest, PipelineDependencies, PipelineSettings} from './contracts'
export {isPipelineError, PipelineError, pipelineError, pipelineErrorCodes, type PipelineErrorCode} from './errors'
export {ExecutionPipeline, summarizeJobStatus} from './pipeline'
export {validateCallInputs, type FileInput, type FileInputSource, type ValidatedInputs} from './validation'
