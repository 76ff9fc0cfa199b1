/**
 * Global shared types re-exported from a single entry point.
 *
 * Dependency direction: types/index.ts → nothing (leaf module)
 * Used by: src/index.ts and library consumers
 */

// Re-export all error types
export {
    AppError,
    ConfigError,
    WorkflowError,
    ValidationError,
    StartupError,
    DependencyCycleError,
    CollaboratorError,
} from '../core/errors.js';

// Re-export config types
export type {
    AppConfig,
    AppConfigInput,
    GateConfig,
    DispatchConfig,
    RunConfig,
    StagesConfig,
    ReviewerConfig,
    TestsConfig,
    ServiceConfig,
} from '../core/config/types.js';

// Re-export record types
export type {
    Task,
    TaskMetadata,
    TaskStatus,
    Evidence,
    EvidenceType,
    ReviewGate,
    Conflict,
    Handoff,
    RecoveryRecord,
    Metrics,
    Skill,
    StartupRecord,
    WorkflowRecord,
    RecordOfKind,
} from '../core/records/types.js';

export type { StageName, RunStateName } from '../core/stages.js';
export type { GateAction, GateErrorKind, GateIssue, GatePolicy } from '../core/gate/policy.js';

// Re-export collaborator interfaces
export type {
    StageExecutionContext,
    StageHandler,
    StageHandlerResult,
    PlanContext,
    PlanResult,
    Planner,
    EvidencePackage,
    ReviewVerdict,
    ExternalReviewer,
    PlanApprover,
    KeyValueStore,
    Timer,
    TimerHandle,
    TestRunner,
    TestRunResult,
    ServiceProbe,
} from '../collaborators/types.js';
