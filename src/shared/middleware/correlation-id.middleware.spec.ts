import { NextFunction, Request, Response } from 'express';
import * as requestContext from '../context/request-context';
import {
  correlationIdMiddleware,
  resolveCorrelationId,
} from './correlation-id.middleware';

const UUID_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

describe('resolveCorrelationId', () => {
  it('keeps a safe incoming id', () => {
    expect(resolveCorrelationId('trace-abc_123')).toBe('trace-abc_123');
  });

  it('takes the first element of a repeated header', () => {
    expect(resolveCorrelationId(['first-id', 'second-id'])).toBe('first-id');
  });

  it('generates a UUID when the header is missing', () => {
    expect(resolveCorrelationId(undefined)).toMatch(UUID_REGEX);
  });

  it('generates a UUID for an empty string', () => {
    expect(resolveCorrelationId('')).toMatch(UUID_REGEX);
  });

  it('generates a UUID for unsafe characters', () => {
    expect(resolveCorrelationId('abc\ninjected: 1')).toMatch(UUID_REGEX);
  });

  it('accepts exactly 128 characters', () => {
    const exactId = 'b'.repeat(128);

    expect(resolveCorrelationId(exactId)).toBe(exactId);
  });

  it('replaces ids longer than 128 characters', () => {
    expect(resolveCorrelationId('a'.repeat(129))).toMatch(UUID_REGEX);
  });
});

describe('correlationIdMiddleware', () => {
  let res: jest.Mocked<Pick<Response, 'setHeader'>>;
  let next: jest.MockedFunction<NextFunction>;

  beforeEach(() => {
    res = { setHeader: jest.fn() } as unknown as jest.Mocked<
      Pick<Response, 'setHeader'>
    >;
    next = jest.fn();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes the resolved id back to the request and the response', () => {
    const req = { headers: { 'x-request-id': 'known-id' } } as unknown as Request;

    correlationIdMiddleware(req, res as unknown as Response, next);

    expect(req.headers['x-request-id']).toBe('known-id');
    expect(res.setHeader).toHaveBeenCalledWith('x-request-id', 'known-id');
  });

  it('echoes a generated UUID when none was sent', () => {
    const req = { headers: {} } as unknown as Request;

    correlationIdMiddleware(req, res as unknown as Response, next);

    expect(res.setHeader).toHaveBeenCalledWith(
      'x-request-id',
      expect.stringMatching(UUID_REGEX),
    );
  });

  it('runs next() inside the request context', () => {
    const req = { headers: { 'x-request-id': 'ctx-id' } } as unknown as Request;
    let seen: string | undefined;
    next.mockImplementation(() => {
      seen = requestContext.getCorrelationId();
    });

    correlationIdMiddleware(req, res as unknown as Response, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(seen).toBe('ctx-id');
  });

  it('leaves no context behind once next() returns', () => {
    const req = { headers: {} } as unknown as Request;

    correlationIdMiddleware(req, res as unknown as Response, next);

    expect(requestContext.getCorrelationId()).toBeUndefined();
  });
});
