/**
 * @entry Cognitive pipeline
 *
 * Request orchestration, deadlines, the request state machine, the
 * background supervisor, and runtime assembly.
 */

export { CognitivePipeline, DEGRADED_REPLY } from './cognitivePipeline.js'
export type { PipelineDeps, PipelineSettings } from './cognitivePipeline.js'
export { createRuntime, loadRuntime } from './createRuntime.js'
export type { CognitiveRuntime, RuntimeOptions, RuntimeStatus } from './createRuntime.js'
export { BackgroundSupervisor } from './backgroundSupervisor.js'
export type { BackgroundJob, SupervisorInfo, SupervisorOptions } from './backgroundSupervisor.js'
export { RequestStateMachine } from './requestStateMachine.js'
export { runWithDeadline } from './runWithDeadline.js'
export * from './types.js'
