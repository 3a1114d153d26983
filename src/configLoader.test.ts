import config from 'config';
import { _resetConfigForTesting, getConfig, loadConfig, setConfig, AppConfig } from './configLoader';
import { LogLevel } from './logger';

jest.mock('config', () => ({
  util: { toObject: jest.fn() },
}));
jest.mock('./logger', () => ({
  ...jest.requireActual('./logger'),
  log: jest.fn(),
}));

const toObjectMock = jest.mocked(config.util.toObject);

describe('configLoader', () => {
  beforeEach(() => {
    _resetConfigForTesting();
    jest.clearAllMocks();
  });

  describe('loadConfig', () => {
    it('should return the configuration from the config files', () => {
      toObjectMock.mockReturnValue({
        env: 'test',
        appName: 'todotxt-core',
        version: '1.0.0',
        logging: { consoleLogLevel: 'WARN', fileLogLevel: 'DEBUG', logFile: 'logs/todo.log', consoleQuietMode: false },
      });

      expect(loadConfig()).toEqual({
        env: 'test',
        appName: 'todotxt-core',
        version: '1.0.0',
        logging: {
          consoleLogLevel: LogLevel.WARN,
          fileLogLevel: LogLevel.DEBUG,
          logFile: 'logs/todo.log',
          consoleQuietMode: false,
        },
      });
    });

    it('should accept lowercase levels and string flags from environment variables', () => {
      toObjectMock.mockReturnValue({
        appName: 'todotxt-core',
        version: '1.0.0',
        logging: { consoleLogLevel: 'debug', consoleQuietMode: 'TRUE' },
      });

      expect(loadConfig().logging).toEqual({
        consoleLogLevel: LogLevel.DEBUG,
        fileLogLevel: LogLevel.INFO,
        logFile: '',
        consoleQuietMode: true,
      });
    });

    it('should fill in every default when no config files were found', () => {
      toObjectMock.mockReturnValue({});

      expect(loadConfig()).toEqual({
        env: 'development',
        appName: 'todotxt-core',
        version: '1.0.0',
        logging: {
          consoleLogLevel: LogLevel.INFO,
          fileLogLevel: LogLevel.INFO,
          logFile: '',
          consoleQuietMode: false,
        },
      });
    });

    it('should keep the host app name and fill in the logging section', () => {
      toObjectMock.mockReturnValue({ appName: 'todo-sync', version: '3.1.0' });

      const loaded = loadConfig();

      expect(loaded.appName).toBe('todo-sync');
      expect(loaded.version).toBe('3.1.0');
      expect(loaded.logging.consoleLogLevel).toBe(LogLevel.INFO);
    });

    it('should name the field when the configuration has the wrong type', () => {
      toObjectMock.mockReturnValue({ appName: 42 });

      expect(() => loadConfig()).toThrow('Invalid configuration: appName: Expected string, received number');
    });

    it('should silence the missing config directory warning', () => {
      expect(process.env.SUPPRESS_NO_CONFIG_WARNING).toBeDefined();
    });

    it('should reject an unknown log level', () => {
      toObjectMock.mockReturnValue({
        appName: 'todotxt-core',
        version: '1.0.0',
        logging: { consoleLogLevel: 'LOUD' },
      });

      expect(() => loadConfig()).toThrow(/^Invalid configuration: logging\.consoleLogLevel: /);
    });
  });

  describe('getConfig', () => {
    it('should load once and reuse the result', () => {
      toObjectMock.mockReturnValue({ appName: 'todotxt-core', version: '1.0.0' });

      const first = getConfig();
      const second = getConfig();

      expect(second).toBe(first);
      expect(toObjectMock).toHaveBeenCalledTimes(1);
    });

    it('should return a configuration set in memory', () => {
      const custom: AppConfig = {
        env: 'production',
        appName: 'todo-sync',
        version: '2.0.0',
        logging: { consoleLogLevel: LogLevel.ERROR, fileLogLevel: LogLevel.WARN, logFile: '', consoleQuietMode: true },
      };

      setConfig(custom);

      expect(getConfig()).toBe(custom);
      expect(toObjectMock).not.toHaveBeenCalled();
    });
  });
});
