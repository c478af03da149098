import { HttpException, HttpStatus, ArgumentsHost } from '@nestjs/common';
import { HttpExceptionFilter } from './http-exception.filter';
import { ResponseCodes } from '../dto/api-response.dto';
import { SessionUnavailableError } from '../../session/errors/session-unavailable.error';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let mockResponse: { status: jest.Mock; json: jest.Mock };
  let mockRequest: { method: string; url: string };
  let mockHost: ArgumentsHost;

  beforeEach(() => {
    filter = new HttpExceptionFilter();
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    };
    mockRequest = {
      method: 'POST',
      url: '/api/chat/message',
    };
    mockHost = {
      switchToHttp: jest.fn().mockReturnValue({
        getResponse: () => mockResponse,
        getRequest: () => mockRequest,
      }),
    } as unknown as ArgumentsHost;
  });

  describe('HttpException', () => {
    it('should format a string response', () => {
      filter.catch(
        new HttpException('Session not found', HttpStatus.NOT_FOUND),
        mockHost,
      );

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.NOT_FOUND);
      expect(mockResponse.json).toHaveBeenCalledWith({
        data: null,
        code: ResponseCodes.NOT_FOUND,
        httpStatus: HttpStatus.NOT_FOUND,
        description: 'Session not found',
      });
    });

    it('should use the message of an object response', () => {
      filter.catch(
        new HttpException(
          { message: 'Missing user id', error: 'Unauthorized' },
          HttpStatus.UNAUTHORIZED,
        ),
        mockHost,
      );

      expect(mockResponse.json).toHaveBeenCalledWith({
        data: null,
        code: ResponseCodes.UNAUTHORIZED,
        httpStatus: HttpStatus.UNAUTHORIZED,
        description: 'Missing user id',
      });
    });

    it('should join validation messages and flag them as validation errors', () => {
      filter.catch(
        new HttpException(
          {
            message: ['message should not be empty', 'message must be a string'],
            error: 'Bad Request',
          },
          HttpStatus.BAD_REQUEST,
        ),
        mockHost,
      );

      expect(mockResponse.json).toHaveBeenCalledWith({
        data: null,
        code: ResponseCodes.VALIDATION_ERROR,
        httpStatus: HttpStatus.BAD_REQUEST,
        description: 'message should not be empty; message must be a string',
      });
    });

    it.each([
      [HttpStatus.BAD_REQUEST, ResponseCodes.BAD_REQUEST],
      [HttpStatus.FORBIDDEN, ResponseCodes.FORBIDDEN],
      [HttpStatus.UNPROCESSABLE_ENTITY, ResponseCodes.VALIDATION_ERROR],
      [HttpStatus.SERVICE_UNAVAILABLE, ResponseCodes.SERVICE_UNAVAILABLE],
      [HttpStatus.CONFLICT, ResponseCodes.INTERNAL_ERROR],
    ])('should map status %i to %s', (status, code) => {
      filter.catch(new HttpException('failure', status), mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({ code, httpStatus: status }),
      );
    });
  });

  describe('SessionUnavailableError', () => {
    it('should respond with 503', () => {
      filter.catch(
        new SessionUnavailableError('Failed to initialize chat session'),
        mockHost,
      );

      expect(mockResponse.status).toHaveBeenCalledWith(
        HttpStatus.SERVICE_UNAVAILABLE,
      );
      expect(mockResponse.json).toHaveBeenCalledWith({
        data: null,
        code: ResponseCodes.SERVICE_UNAVAILABLE,
        httpStatus: HttpStatus.SERVICE_UNAVAILABLE,
        description: 'Failed to initialize chat session',
      });
    });
  });

  describe('other exceptions', () => {
    it('should treat a generic Error as 500', () => {
      filter.catch(new Error('Something went wrong'), mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith({
        data: null,
        code: ResponseCodes.INTERNAL_ERROR,
        httpStatus: HttpStatus.INTERNAL_SERVER_ERROR,
        description: 'Something went wrong',
      });
    });

    it('should describe a non-Error value generically', () => {
      filter.catch('string exception', mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith({
        data: null,
        code: ResponseCodes.INTERNAL_ERROR,
        httpStatus: HttpStatus.INTERNAL_SERVER_ERROR,
        description: 'An unexpected error occurred',
      });
    });
  });

  describe('message sanitising', () => {
    const originalEnv = process.env.NODE_ENV;

    afterEach(() => {
      process.env.NODE_ENV = originalEnv;
    });

    it('should strip source paths with line numbers', () => {
      filter.catch(
        new HttpException(
          'Error in /srv/app/src/chat/chat.service.ts:50:10',
          HttpStatus.BAD_REQUEST,
        ),
        mockHost,
      );

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({ description: 'Error in' }),
      );
    });

    it('should hide 500 details in production', () => {
      process.env.NODE_ENV = 'production';

      filter.catch(new Error('connect ECONNREFUSED 10.0.0.1:6379'), mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          description:
            'An internal server error occurred. Please try again later.',
        }),
      );
    });

    it('should keep non-500 messages in production', () => {
      process.env.NODE_ENV = 'production';

      filter.catch(
        new HttpException('Session not found', HttpStatus.NOT_FOUND),
        mockHost,
      );

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({ description: 'Session not found' }),
      );
    });
  });
});
