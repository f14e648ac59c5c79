export {
  QuoteCastError,
  notFound,
  persistenceFailure,
  alreadyDelivered,
  validationFailure,
  errorMessage,
  type QuoteCastErrorKind,
} from './errors.js';
export {
  ok,
  err,
  isOk,
  isErr,
  map,
  unwrapOr,
  tryCatch,
  type Ok,
  type Err,
  type Result,
} from './result.js';
