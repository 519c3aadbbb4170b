export { duration, formatSlurmDuration, isDuration, type Duration, type DurationParts } from "./core/duration.js";
export {
  DependentOptionError,
  ExecutableNotFoundError,
  InvalidDependencyKindError,
  isOptionError,
  MutuallyExclusiveError,
  SbatchKitError,
  SubmissionError,
  UnknownOptionError,
  ValidationError,
  type SbatchKitErrorCode
} from "./core/errors.js";
export {
  SlurmJob,
  defaultInterpreter,
  type DeferAllocation,
  type ExportEnv,
  type JobStreams,
  type NodeConstraints,
  type NodesAllocation,
  type SignalOptions,
  type SlurmJobInit,
  type Specialization,
  type SubmissionState,
  type TasksAllocation
} from "./job/slurmJob.js";
export { CrayJob, CRAY_NETWORK_TYPES, type CrayNetwork } from "./job/crayJob.js";
export {
  chainJobs,
  DEPENDENCY_KINDS,
  DependencySet,
  isDependencyKind,
  type DependencyKind,
  type Prerequisite
} from "./job/dependencies.js";
export {
  BEGIN_TOKENS,
  MAIL_TYPES,
  type BeginSpec,
  type GresSpec,
  type LicenseSpec,
  type MailType,
  type OptionValue,
  type SwitchesSpec
} from "./options/values.js";
export { formatOptionValue, renderDirective, renderOption } from "./render/renderer.js";
export { OptionRegistry, type OptionContainer } from "./options/registry.js";
export type { Rule } from "./options/rules.js";
export { runLocalProcess, type CommandResult, type CommandRunner } from "./execution/localProcess.js";
export { locateExecutable, resolveSbatchPath } from "./execution/slurm/executable.js";
export {
  parseSbatchJobId,
  SbatchSubmitter,
  type SbatchSubmitterOptions,
  type SlurmSubmitResult,
  type SlurmSubmitter
} from "./execution/slurm/submitter.js";
export { parseSlurmVersionInfo, slurmVersion, slurmVersionInfo, type SlurmVersionInfo } from "./execution/slurm/version.js";
