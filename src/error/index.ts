/**
 * Error entrypoint: the classified error taxonomy plus helpers for identifying and unwrapping errors.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { ApiDomainError, getApiDomainError, isApiDomainError } from './apiDomainError.js';
export { ApiResponseError, ChainQueryError, getChainQueryError, isChainQueryError } from './chainQueryError.js';
export { ClientRequestError, getClientRequestError, isClientRequestError } from './clientRequestError.js';
export { ConfigError, isConfigError } from './configError.js';
export { ErrorKind } from './errorKind.js';
export { isErrorType } from './isErrorType.js';
export { isMissingCredentialError, MissingCredentialError } from './missingCredentialError.js';
export { getNetworkError, isNetworkError, NetworkError } from './networkError.js';
export { isRateLimitedError, RateLimitedError } from './rateLimitedError.js';
export { getRequestSpecError, isRequestSpecError, RequestSpecError } from './requestSpecError.js';
export { getSerializationError, isSerializationError, SerializationError } from './serializationError.js';
export { isServerError, ServerError } from './serverError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
