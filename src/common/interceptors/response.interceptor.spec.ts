import { ExecutionContext, CallHandler, HttpStatus } from '@nestjs/common';
import { lastValueFrom, of } from 'rxjs';
import { ResponseInterceptor } from './response.interceptor';
import { ResponseCodes } from '../dto/api-response.dto';

describe('ResponseInterceptor', () => {
  let interceptor: ResponseInterceptor<unknown>;
  let mockResponse: { statusCode: number };
  let mockRequest: { method: string; url: string };
  let mockExecutionContext: ExecutionContext;

  const run = (data: unknown) => {
    const handler: CallHandler<unknown> = { handle: () => of(data) };
    return lastValueFrom(interceptor.intercept(mockExecutionContext, handler));
  };

  beforeEach(() => {
    interceptor = new ResponseInterceptor();
    mockResponse = { statusCode: HttpStatus.OK };
    mockRequest = { method: 'GET', url: '/' };
    mockExecutionContext = {
      switchToHttp: jest.fn().mockReturnValue({
        getResponse: () => mockResponse,
        getRequest: () => mockRequest,
      }),
    } as unknown as ExecutionContext;
  });

  it('should wrap a chat reply', async () => {
    mockRequest = { method: 'POST', url: '/api/chat/message' };
    mockResponse.statusCode = HttpStatus.CREATED;

    await expect(run({ aiResponse: 'Hello' })).resolves.toEqual({
      data: { aiResponse: 'Hello' },
      code: ResponseCodes.CHAT_REPLY,
      httpStatus: HttpStatus.CREATED,
      description: 'Reply generated',
    });
  });

  it('should tag history reads', async () => {
    mockRequest = { method: 'GET', url: '/api/chat/sessions/abc/history' };

    const result = await run({ messages: [] });

    expect(result.code).toBe(ResponseCodes.CHAT_HISTORY);
    expect(result.description).toBe('Conversation history retrieved');
  });

  it('should tag session deletion', async () => {
    mockRequest = { method: 'DELETE', url: '/api/chat/sessions/abc' };

    const result = await run({ ended: true });

    expect(result.code).toBe(ResponseCodes.SESSION_ENDED);
  });

  it('should turn undefined data into null', async () => {
    const result = await run(undefined);

    expect(result).toEqual({
      data: null,
      code: ResponseCodes.SUCCESS,
      httpStatus: HttpStatus.OK,
      description: 'Request processed successfully',
    });
  });

  describe('health endpoints', () => {
    beforeEach(() => {
      mockRequest = { method: 'GET', url: '/health/detailed' };
    });

    it('should report healthy', async () => {
      const result = await run({ status: 'healthy' });
      expect(result.code).toBe(ResponseCodes.HEALTH_OK);
    });

    it('should report degraded', async () => {
      const result = await run({ status: 'degraded' });
      expect(result.code).toBe(ResponseCodes.HEALTH_DEGRADED);
    });

    it('should report unhealthy', async () => {
      const result = await run({ status: 'unhealthy' });
      expect(result.code).toBe(ResponseCodes.HEALTH_UNHEALTHY);
      expect(result.description).toBe('Service is unhealthy');
    });
  });
});
