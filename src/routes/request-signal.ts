import type { FastifyReply } from 'fastify';
import { CancelledError } from '@utils/errors';

/**
 * A signal aborted when the client disconnects before the response is
 * written, so long extractions stop instead of running for nobody.
 */
export function requestSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort(new CancelledError('Client disconnected'));
  });
  return controller.signal;
}
