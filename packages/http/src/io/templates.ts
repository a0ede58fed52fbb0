import type { ExceptionTriple } from '../exceptions/exception-triple.js';

import type { RequestTemplate } from './interfaces.js';
import type { Transition } from './transitions.js';

/**
 * Combines templates. Each hook asks the members in order and returns the
 * first transition that is not `none`, so every member observes each event
 * until one of them claims it.
 */
export class CompositeRequestTemplate<Req = unknown, Res = unknown> implements RequestTemplate<Req, Res> {
  private readonly templates: readonly RequestTemplate<Req, Res>[];

  constructor(...templates: RequestTemplate<Req, Res>[]) {
    this.templates = templates;
  }

  beforeRequest(request: Req): Transition<Req, Res> | undefined {
    return this.firstClaim((template) => template.beforeRequest?.(request));
  }

  afterResponse(request: Req, response: Res): Transition<Req, Res> | undefined {
    return this.firstClaim((template) => template.afterResponse?.(request, response));
  }

  afterException(request: Req, failure: ExceptionTriple): Transition<Req, Res> | undefined {
    return this.firstClaim((template) => template.afterException?.(request, failure));
  }

  private firstClaim(
    hook: (template: RequestTemplate<Req, Res>) => Transition<Req, Res> | undefined
  ): Transition<Req, Res> | undefined {
    for (const template of this.templates) {
      const transition = hook(template);
      if (transition !== undefined && transition.kind !== 'none') {
        return transition;
      }
    }
    return undefined;
  }
}
