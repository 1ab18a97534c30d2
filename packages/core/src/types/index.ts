export type {
  Record,
  ReadOptions,
  ReadResult,
  WriteResult,
  FieldIssue,
} from './record.js';
