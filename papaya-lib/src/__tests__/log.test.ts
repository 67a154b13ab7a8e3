import log, { ConsoleLogger, Logger, setLogger } from '../log';

describe('The console logger', () => {
  let spies: jest.SpyInstance[];

  beforeEach(() => {
    spies = (['debug', 'info', 'warn', 'error'] as const).map((method) =>
      jest.spyOn(console, method).mockImplementation(() => undefined)
    );
  });

  afterEach(() => {
    spies.forEach((spy) => spy.mockRestore());
  });

  it('should only write warnings and errors by default', () => {
    const logger = new ConsoleLogger();
    logger.debug('starting');
    logger.info('fetched', 42);
    logger.warn('slow response');
    logger.error('gave up');
    expect(console.debug).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('slow response');
    expect(console.error).toHaveBeenCalledWith('gave up');
  });

  it('should write everything at the debug level', () => {
    const logger = new ConsoleLogger('debug');
    logger.debug('starting', { id: 'a' });
    logger.info('fetched', 42);
    expect(console.debug).toHaveBeenCalledWith('starting', { id: 'a' });
    expect(console.info).toHaveBeenCalledWith('fetched', 42);
  });

  it('should always write errors', () => {
    const logger = new ConsoleLogger('error');
    logger.warn('slow response');
    logger.error('gave up');
    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('gave up');
  });
});

describe('The library logger', () => {
  afterEach(() => {
    setLogger(new ConsoleLogger());
  });

  it('should forward to the installed logger', () => {
    const messages: string[] = [];
    const recorder: Logger = {
      debug: (message) => messages.push(`debug: ${message}`),
      info: (message) => messages.push(`info: ${message}`),
      warn: (message) => messages.push(`warn: ${message}`),
      error: (message) => messages.push(`error: ${message}`),
    };
    setLogger(recorder);
    log.debug('one');
    log.error('two');
    expect(messages).toEqual(['debug: one', 'error: two']);
  });
});
