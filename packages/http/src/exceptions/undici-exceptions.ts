import { errors } from 'undici';

import { ExceptionTable, whenCode, whenInstanceOf, whenName, type ExceptionRule } from './exception-table.js';
import { CONNECTION_ERROR_CODES, INVALID_URL_CODES, TLS_ERROR_CODES } from './system-codes.js';

/**
 * undici's `fetch` rejects with `TypeError('fetch failed')` and puts the real
 * failure in `cause`; the rules below look through that chain.
 */
const isFetchFailure = (error: unknown): boolean => error instanceof TypeError && error.message === 'fetch failed';

const rules: readonly ExceptionRule[] = [
  whenCode('InvalidURL', INVALID_URL_CODES),
  whenCode('SSLError', TLS_ERROR_CODES),
  whenInstanceOf('ConnectionTimeout', errors.ConnectTimeoutError),
  whenCode('ConnectionTimeout', ['UND_ERR_CONNECT_TIMEOUT', 'ETIMEDOUT']),
  whenInstanceOf('ServerTimeout', errors.HeadersTimeoutError),
  whenInstanceOf('ServerTimeout', errors.BodyTimeoutError),
  // Per-request timeouts abort through AbortSignal.timeout()
  whenName('ServerTimeout', ['TimeoutError']),
  whenInstanceOf('ConnectionError', errors.SocketError),
  whenCode('ConnectionError', CONNECTION_ERROR_CODES),
  whenInstanceOf('BaseClientException', errors.UndiciError),
  { kind: 'BaseClientException', matches: isFetchFailure },
];

export const undiciExceptions = new ExceptionTable('undici', rules);
