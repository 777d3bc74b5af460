/**
 * sector-analyst - Main module exports
 * Public API surface for embedding the analysis engine
 */

// Core types and errors
export * from './core/types.js'
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { RunEvents, TaskError } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Orchestration
export { runAnalysis, resolveSelection, resolveRunOptions } from './modules/orchestrator/run-analysis.js'
export type { RunAnalysisOptions, RunAnalysisDeps, ResolvedRunOptions } from './modules/orchestrator/run-analysis.js'
export { DependencyGraph } from './modules/dependency-graph/dependency-graph.js'
export type { RoleDeclaration } from './modules/dependency-graph/dependency-graph.js'
export { createResultStore } from './modules/result-store/result-store.js'
export type { ResultStore } from './modules/result-store/result-store.js'
export { createScheduler } from './modules/scheduler/scheduler-impl.js'
export type { AgentTask, Scheduler, SchedulerOptions, TaskExecutor } from './modules/scheduler/scheduler.js'
export { createAggregator } from './modules/aggregator/aggregator.js'
export type { SynthesisExecutor } from './modules/aggregator/aggregator.js'

// Roles
export { RoleRegistry } from './modules/roles/role-registry.js'
export { createBuiltInRegistry, DEFAULT_INDUSTRY, SYNTHESIS_ROLE } from './modules/roles/built-in-roles.js'
export type { RoleDefinition, SynthesisRoleDefinition, RoleOverride } from './modules/roles/role-definition.js'

// Collaborators
export type { InferenceClient, InferenceParams, InferenceResponse } from './modules/inference/inference-client.js'
export { CliInferenceClient } from './modules/inference/cli-inference-client.js'
export type { RawDataProvider, RoleInput, DatasetSummary } from './modules/data/data-provider.js'
export { CsvDataProvider } from './modules/data/csv-data-provider.js'
export type { ArtifactSink, RunArtifacts } from './modules/artifact-sink/artifact-sink.js'
export { FileArtifactSink } from './modules/artifact-sink/file-artifact-sink.js'
export { SqliteArtifactSink } from './modules/artifact-sink/sqlite-artifact-sink.js'
export { CompositeArtifactSink } from './modules/artifact-sink/composite-artifact-sink.js'

// Configuration and run history
export * from './modules/config/index.js'
export { DatabaseWrapper, openDatabase } from './persistence/database.js'
export { listRuns, getRun } from './persistence/queries/runs.js'
