/**
 * Library entry point.
 *
 * Dependency direction: index.ts → core, collaborators
 * Used by: programs embedding the engine instead of the CLI
 */

export * from './types/index.js';

export { PIPELINE_STAGES, RunState, EXTERNAL_APPROVAL_STAGES, isStageName, stageAfter } from './core/stages.js';
export { SCHEMA_NAMES, RECORD_SCHEMAS } from './core/records/schema.js';
export { validateRecord, detectSchema, isSchemaName, type ValidationResult } from './core/records/validator.js';
export { envelope, serializeRecord, parseRecord, toWorkflowRecord } from './core/records/codec.js';
export { RecordStore } from './core/records/store.js';

export { QualityGateEngine, type GateDecision, type GateEngineOptions } from './core/gate/engine.js';
export { EvidenceVerifier, type VerificationResult } from './core/gate/evidence-verifier.js';
export { FileGateLog, type GateLog, type GateLogEntry } from './core/gate/gate-log.js';
export { DEFAULT_GATE_POLICY, REQUIRED_SCHEMAS, decideAction, formatIssue } from './core/gate/policy.js';
export { formatRemediationReport } from './core/gate/report.js';

export { StageDispatcher, topologicalOrder, type DispatchResult, type TaskResult } from './core/workflow/dispatcher.js';
export {
    createRunContext,
    transition,
    nextState,
    resumeAt,
    TRANSITIONS,
    type RunContext,
    type RunEvent,
} from './core/workflow/state-machine.js';
export { runStartupChecks, RUN_SUBDIRS } from './core/workflow/startup.js';
export { LivenessMonitor } from './core/workflow/liveness.js';
export { loadRun, listRuns, getRunDir } from './core/workflow/session.js';
export {
    Orchestrator,
    type OrchestratorDependencies,
    type OrchestratorSettings,
    type RunOutcome,
} from './core/workflow/orchestrator.js';

export { loadConfig, saveConfig, getDefaultConfig, parseConfig } from './core/config/manager.js';
export { createCollaborators, createOrchestratorSettings } from './collaborators/factory.js';
