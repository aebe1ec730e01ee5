export { Result, toError } from './result';

export {
  ConfigurationError,
  FixtureNotFoundError,
  ClientRequestError,
  TransportError,
  DeliveryError,
  isFatalFetchError,
} from './errors';

export {
  validateIsoDate,
  validatePositiveInt,
  validateTime,
} from './validation';
