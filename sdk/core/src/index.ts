export {
  HttpClient,
  type HttpClientConfig,
  type HttpMethod,
  type QueryParams,
  type RawBody,
  type RequestOptions,
} from './http/HttpClient.js';
export { HttpError, NetworkError, TimeoutError, isHttpError } from './http/errors.js';
export { createDispatcher, type TlsVerify } from './http/tls.js';
export { delay } from './utils.js';
