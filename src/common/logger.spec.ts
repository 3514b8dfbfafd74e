import * as winston from 'winston';
import { WinstonLoggerService } from './logger';

describe('WinstonLoggerService', () => {
  const target = winston.createLogger({ silent: true });
  let write: jest.SpyInstance;

  beforeEach(() => {
    write = jest.spyOn(target, 'log').mockImplementation(() => target);
  });

  afterEach(() => {
    write.mockRestore();
  });

  it('passes the Nest context as metadata', () => {
    new WinstonLoggerService(target).log('Connected to mpv IPC', 'MpvBridge');

    expect(write).toHaveBeenCalledWith('info', 'Connected to mpv IPC', { context: 'MpvBridge' });
  });

  it('keeps the stack of errors', () => {
    new WinstonLoggerService(target).error('Initialization crashed', 'Error: boom\n    at test', 'MpvBridge');

    expect(write).toHaveBeenCalledWith('error', 'Initialization crashed', {
      context: 'MpvBridge',
      stack: 'Error: boom\n    at test',
    });
  });

  it('keeps the stack of errors logged without a context', () => {
    new WinstonLoggerService(target).error('Initialization crashed', 'Error: boom\n    at test');

    expect(write).toHaveBeenCalledWith('error', 'Initialization crashed', { stack: 'Error: boom\n    at test' });
  });

  it('logs without a context', () => {
    new WinstonLoggerService(target).warn({ attempt: 2 });

    expect(write).toHaveBeenCalledWith('warn', '{"attempt":2}', {});
  });
});
