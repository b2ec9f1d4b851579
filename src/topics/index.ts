// Barrel-файл модуля топиков.
export type { Topic, TopicsFormat } from './types.js';
export { TopicSet, TOPICS_FORMATS } from './types.js';
export {
  parseTsvTopics,
  parseJsonlTopics,
  parseKiltTopics,
  parseTrecTopics,
  assertUniqueIds,
} from './parsers.js';
export type { ResolvedTopics } from './reader.js';
export { readTopics, readTopicsFile, resolveTopics, parseTopicsFormat } from './reader.js';
