import { HttpService } from '@nestjs/axios';
import { Test, TestingModule } from '@nestjs/testing';
import { AxiosError } from 'axios';
import { getLoggerToken, PinoLogger } from 'nestjs-pino';
import * as requestContext from '../context/request-context';
import { LoggingInterceptor } from './logging.interceptor';

type RequestConfig = {
  method?: string;
  url: string;
  headers: Record<string, string>;
};

describe('LoggingInterceptor', () => {
  let interceptor: LoggingInterceptor;
  let requestUseMock: jest.Mock;
  let responseUseMock: jest.Mock;
  let requestInterceptors: Array<(config: RequestConfig) => RequestConfig>;
  let responseInterceptors: Array<{
    fulfilled: (res: unknown) => unknown;
    rejected: (err: unknown) => Promise<never>;
  }>;
  let mockLogger: jest.Mocked<PinoLogger>;

  beforeEach(async () => {
    requestInterceptors = [];
    responseInterceptors = [];

    requestUseMock = jest.fn((fn: (config: RequestConfig) => RequestConfig) => {
      requestInterceptors.push(fn);
      return 0;
    });

    responseUseMock = jest.fn(
      (
        fulfilled: (res: unknown) => unknown,
        rejected: (err: unknown) => Promise<never>,
      ) => {
        responseInterceptors.push({ fulfilled, rejected });
        return 0;
      },
    );

    const mockHttpService = {
      axiosRef: {
        interceptors: {
          request: { use: requestUseMock },
          response: { use: responseUseMock },
        },
      },
    } as unknown as HttpService;

    mockLogger = {
      info: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
    } as unknown as jest.Mocked<PinoLogger>;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LoggingInterceptor,
        { provide: HttpService, useValue: mockHttpService },
        {
          provide: getLoggerToken(LoggingInterceptor.name),
          useValue: mockLogger,
        },
      ],
    }).compile();

    interceptor = module.get<LoggingInterceptor>(LoggingInterceptor);
    interceptor.onModuleInit();
  });

  afterEach(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
  });

  it('registers one request and one response interceptor', () => {
    expect(requestUseMock).toHaveBeenCalledTimes(1);
    expect(responseUseMock).toHaveBeenCalledTimes(1);
  });

  describe('request', () => {
    it('forwards the correlation id as x-request-id', () => {
      jest.spyOn(requestContext, 'getCorrelationId').mockReturnValue('trace-1');

      const result = requestInterceptors[0]({
        method: 'get',
        url: '/records',
        headers: {},
      });

      expect(result.headers['x-request-id']).toBe('trace-1');
    });

    it('leaves headers alone outside a request context', () => {
      jest.spyOn(requestContext, 'getCorrelationId').mockReturnValue(undefined);

      const result = requestInterceptors[0]({
        method: 'get',
        url: '/records',
        headers: {},
      });

      expect(result.headers).toEqual({});
    });

    it('logs the outbound call', () => {
      jest.spyOn(requestContext, 'getCorrelationId').mockReturnValue('trace-2');

      requestInterceptors[0]({ method: 'get', url: '/records/3', headers: {} });

      expect(mockLogger.info).toHaveBeenCalledWith(
        {
          direction: 'outbound',
          method: 'GET',
          url: '/records/3',
          correlationId: 'trace-2',
        },
        '→ GET /records/3',
      );
    });

    it('treats a missing method as GET', () => {
      jest.spyOn(requestContext, 'getCorrelationId').mockReturnValue(undefined);

      requestInterceptors[0]({ url: '/records', headers: {} });

      expect(mockLogger.info).toHaveBeenCalledWith(
        expect.objectContaining({ method: 'GET' }),
        '→ GET /records',
      );
    });
  });

  describe('response', () => {
    it('logs and returns a successful response untouched', () => {
      jest.spyOn(requestContext, 'getCorrelationId').mockReturnValue('trace-3');
      const res = { status: 200, config: { url: '/records' } };

      const result = responseInterceptors[0].fulfilled(res);

      expect(result).toBe(res);
      expect(mockLogger.info).toHaveBeenCalledWith(
        {
          direction: 'inbound',
          status: 200,
          url: '/records',
          correlationId: 'trace-3',
        },
        '← 200 /records',
      );
    });

    it('logs a failed backend call and rejects with the same error', async () => {
      jest.spyOn(requestContext, 'getCorrelationId').mockReturnValue(undefined);
      const error = new AxiosError('Not Found', 'ERR_BAD_REQUEST');
      error.response = {
        status: 404,
        data: {},
        statusText: 'Not Found',
        headers: {},
        config: {} as never,
      };
      error.config = { url: '/records/99', headers: {} as never };

      await expect(responseInterceptors[0].rejected(error)).rejects.toBe(error);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ status: 404, url: '/records/99' }),
        '← 404 /records/99',
      );
    });

    it('rejects non-axios errors without logging', async () => {
      const error = new Error('boom');

      await expect(responseInterceptors[0].rejected(error)).rejects.toThrow(
        'boom',
      );
      expect(mockLogger.warn).not.toHaveBeenCalled();
    });
  });
});
