import {
  SessionConnectTimeoutError,
  SessionConnectionError,
  SessionError,
  SessionInvalidURLError,
  SessionReadTimeoutError,
  SessionSSLError,
} from '../clients/session-errors.js';

import { ExceptionTable, whenInstanceOf } from './exception-table.js';

export const blockingExceptions = new ExceptionTable('blocking', [
  whenInstanceOf('InvalidURL', SessionInvalidURLError),
  whenInstanceOf('SSLError', SessionSSLError),
  whenInstanceOf('ConnectionTimeout', SessionConnectTimeoutError),
  whenInstanceOf('ServerTimeout', SessionReadTimeoutError),
  whenInstanceOf('ConnectionError', SessionConnectionError),
  whenInstanceOf('BaseClientException', SessionError),
]);
