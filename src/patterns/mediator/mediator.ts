import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  HandlerRegistry,
  MEDIATOR_HANDLERS,
  RequestHandler,
  RequestOf,
  RequestType,
  ResponseOf,
} from './mediator.interface';

/**
 * Routes a tagged request to the one handler registered for its tag.
 * Senders depend on the mediator only, never on the handlers.
 */
@Injectable()
export class Mediator {
  private readonly logger = new Logger(Mediator.name);

  constructor(@Inject(MEDIATOR_HANDLERS) private readonly handlers: HandlerRegistry) {}

  send<K extends RequestType>(type: K, request: RequestOf<K>, signal?: AbortSignal): Promise<ResponseOf<K>> {
    const handler: RequestHandler<K> = this.handlers[type];
    this.logger.debug(`Routing ${type} to ${handler.constructor.name}`);
    return handler.handle(request, signal);
  }
}
