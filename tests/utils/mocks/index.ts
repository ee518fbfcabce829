/**
 * Barrel export for all test mocks
 */

export { StubRemoteTaskClient, createStubClientFactory } from './remote-client.mock.js';
export type { PushRegistration } from './remote-client.mock.js';
