export {
  GraphError,
  ArtifactBuildError,
  ContentDecodeError,
  StoreError,
  UnsupportedMediaTypeError,
  OperationCancelledError,
  CopyError,
  isCancellation,
  errorMessage,
  throwIfCancelled,
  type GraphErrorCode,
  type GraphErrorOptions,
} from "./errors";
