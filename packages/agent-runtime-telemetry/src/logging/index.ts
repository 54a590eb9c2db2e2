export {
  type CaptureLogger,
  type CapturedLogRecord,
  createCaptureLogger,
  createLogger,
  createRuntimeLogger,
  createSubsystemLogger,
  getLogger,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type RuntimeLogger,
  setLogger,
  wrapLogger,
} from "./logger";
