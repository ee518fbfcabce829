import { setupServer } from 'msw/node';
import { afterAll, afterEach, beforeAll } from 'vitest';

import { handlers } from '../mocks/handlers/index.js';
import { remoteAgent } from '../mocks/handlers/remote-agent.js';

// Stands in for the remote A2A agents; the relay under test listens on localhost
export const server = setupServer(...handlers);

beforeAll(() => {
  server.listen({
    onUnhandledRequest(request, print) {
      const url = new URL(request.url);
      if (url.hostname === 'localhost' || url.hostname === '127.0.0.1') {
        return;
      }

      if (process.env['DEBUG_TESTS']) {
        console.error(`[MSW] Unhandled ${request.method} request to ${request.url}`);
      }

      print.error();
      throw new Error(
        `[MSW] Unhandled ${request.method} request to ${request.url}. ` +
          'Add a handler or explicitly allow this host.',
      );
    },
  });
});

afterEach(() => {
  // Reset handlers and remote agent state between tests
  server.resetHandlers();
  remoteAgent.reset();
});

afterAll(() => {
  server.close();
});
