export { crc32 } from './crc32'
export {
  decodeRecords,
  type RecordEntry,
  RecordingDecoder,
} from './decoder'
export {
  encodeRecord,
  MemoryRecordingSink,
  RecordingEncoder,
  type RecordingEncoderOptions,
  type RecordingSink,
} from './encoder'
export {
  CorruptRecordError,
  RecordingClosedError,
  RecordingError,
} from './errors'
export * from './events'
export {
  type EventKindCode,
  type EventKindName,
  eventKindName,
  isKnownEventKind,
  MAX_PAYLOAD_LENGTH,
  MAX_SESSION_ID_LENGTH,
  RECORD_FORMAT_VERSION,
  RECORD_MAGIC,
  RECORD_OVERHEAD,
  type RecordedEvent,
} from './format'
export { defaultSleep, type PlaybackOptions, playRecording } from './playback'
export {
  matchesQuery,
  type RecordingQuery,
  RecordingReader,
  type SessionSummary,
  toJsonRecord,
} from './query'
export {
  type ChannelRecordKind,
  microsecondClock,
  SessionRecorder,
} from './session-recorder'
