/**
 * Worker-thread entry for {@link MatchWorkerPool}. Answers every chunk request
 * with exactly one response carrying the request's id.
 *
 * @module matcher/match-worker
 */
import { parentPort, threadId } from 'worker_threads';
import { runMatchChunk, type MatchChunkRequest, type MatchChunkResponse } from './match-chunk.js';

const port = parentPort;
if (!port) throw new Error('match-worker must be started as a worker thread');

port.on('message', (request: MatchChunkRequest) => {
  let response: MatchChunkResponse;
  try {
    response = runMatchChunk(request);
  } catch (err) {
    response = {
      id: request.id,
      threadId,
      results: [],
      error: err instanceof Error ? err.message : String(err),
    };
  }
  port.postMessage(response);
});
