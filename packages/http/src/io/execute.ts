import { err, ok, type Result } from 'neverthrow';

import { HttpClientAdapter } from '../clients/interfaces.js';
import { IllegalRequestStateTransition, UnsupportedConfigurationError } from '../errors.js';
import { toError } from '../exceptions/exception-triple.js';

import { CooperativeStrategy } from './cooperative-strategy.js';
import { ExecutionContext } from './execution-context.js';
import type { Client, ExecutionStrategy, RequestTemplate } from './interfaces.js';

export interface ExecuteRequestOptions<Req, Res> {
  client: Client<Req, Res>;
  request: Req;
  /** Defaults to the adapter's own strategy, or the cooperative one for plain clients */
  strategy?: ExecutionStrategy | undefined;
  template?: RequestTemplate<Req, Res> | undefined;
}

/**
 * Run one request to completion.
 *
 * Client failures (translated transport errors, template failures) come back
 * as `err`. Defects are thrown: an illegal state transition or an
 * unsupported configuration never turns into a Result.
 */
export function executeRequest<Req, Res>(options: ExecuteRequestOptions<Req, Res>): Promise<Result<Res, Error>> {
  const { client } = options;
  const strategy =
    options.strategy ?? (client instanceof HttpClientAdapter ? client.io() : new CooperativeStrategy());
  const context = new ExecutionContext({
    client,
    request: options.request,
    strategy,
    template: options.template,
  });

  return new Promise<Res>((resolve) => resolve(context.run())).then(
    (response): Result<Res, Error> => ok(response),
    (error: unknown): Result<Res, Error> => {
      if (error instanceof IllegalRequestStateTransition || error instanceof UnsupportedConfigurationError) {
        throw error;
      }
      return err(toError(error));
    }
  );
}
