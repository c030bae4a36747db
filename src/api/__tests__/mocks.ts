// ═══════════════════════════════════════════════════════════════════════════════
// EXPRESS MOCKS — Minimal Request and Response Doubles
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response } from 'express';

export interface MockBody {
  readonly error?: string;
  readonly code?: string;
  readonly details?: unknown;
  readonly requestId?: string;
  readonly timestamp?: string;
  readonly [key: string]: unknown;
}

export interface MockResponseState {
  _status: number;
  _json: MockBody | undefined;
  _headers: Record<string, string>;
  _ended: boolean;
}

export function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    path: '/test',
    method: 'GET',
    headers: {},
    ...overrides,
  } as Request;
}

export function createMockResponse(): Response & MockResponseState {
  const res = {
    _status: 200,
    _json: undefined as MockBody | undefined,
    _headers: {} as Record<string, string>,
    _ended: false,
    status(code: number) {
      this._status = code;
      return this;
    },
    json(data: MockBody) {
      this._json = data;
      return this;
    },
    setHeader(name: string, value: string) {
      this._headers[name] = value;
      return this;
    },
    end() {
      this._ended = true;
      return this;
    },
  };
  return res as unknown as Response & MockResponseState;
}
