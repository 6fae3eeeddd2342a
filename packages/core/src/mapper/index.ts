export {
  defineRecordMapper,
  parseFieldTag,
  type FieldDescriptor,
  type FieldEntry,
  type FieldTag,
  type RecordMapper,
} from './record-mapper';
