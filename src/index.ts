export { diff, diffFiles, type DiffOptions } from './diff';
export {
  Placeholder,
  classifyNode,
  createDiffRecord,
  createPosition,
  describeValue,
  diffDocuments,
  diffMappings,
  diffSequences,
  diffStreams,
  positionFromMark
} from './differ';
export type * from './differ/types';
export { loadYamlDocuments, type LoadOptions } from './loader';
export {
  computeColumnWidth,
  formatDiffs,
  formatHeader,
  formatSummary,
  type PrintOptions
} from './printer';
export {
  HeaderDocumentError,
  OptionsError,
  UnknownNodeKindError,
  YamlDiffError,
  YamlParseError,
  type YamlDiffErrorCode
} from './errors';
export { createLogger, silentLogger, type Logger } from './utils/logger';
