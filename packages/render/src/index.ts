export { batchConvert, type BatchItem, type BatchReport } from "./batch.js";
export {
  MERMAID_CLI_PACKAGE,
  MMDC_PATH_ENV,
  defaultRoots,
  describeCandidate,
  enumerateCandidates,
  type CandidateKind,
  type EnumerateOptions,
  type InvocationCandidate
} from "./candidates.js";
export { MermaidConverter, type ConverterOptions, type DependencyStatus } from "./converter.js";
export {
  EXCERPT_LINES,
  EXCERPT_WIDTH,
  PLACEHOLDER_HEIGHT,
  PLACEHOLDER_WIDTH,
  PlaceholderUnavailableError,
  buildPlaceholderSvg,
  placeholderExcerpt,
  renderPlaceholder,
  writePlaceholder
} from "./placeholder.js";
export {
  PROBE_DIAGRAM,
  discoverCandidate,
  probeCandidate,
  type DiscoveryResult,
  type ProbeOptions,
  type ProbeVerdict
} from "./probe.js";
export { execute, runCommand, type CommandRunner, type RunOptions, type RunOutcome, type RunResult } from "./runner.js";
