export { classifyNode, isContainer } from './classify';
export { diffDocuments, diffMappings, diffSequences } from './tree';
export { diffStreams } from './stream';
export {
  Placeholder,
  createDiffRecord,
  createPosition,
  describeValue,
  positionFromMark
} from './utils';
export type * from './types';
