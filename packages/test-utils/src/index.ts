export { createMockAdapter } from './http-mocks.js';
export type { MockAdapter, MockReply, RecordedRequest } from './http-mocks.js';
