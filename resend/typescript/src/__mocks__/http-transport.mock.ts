import { vi, type Mock } from 'vitest';
import type { HttpTransport } from '../transport/http.js';

export interface MockHttpTransport extends HttpTransport {
  post: Mock;
  get: Mock;
  patch: Mock;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    post: vi.fn(),
    get: vi.fn(),
    patch: vi.fn(),
  };
}

export function mockHttpTransportError(transport: MockHttpTransport, error: Error): void {
  transport.post.mockRejectedValue(error);
  transport.get.mockRejectedValue(error);
  transport.patch.mockRejectedValue(error);
}
