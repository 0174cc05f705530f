/**
 * @module @asset-session/runtime/__tests__/default-config
 *
 * Tests for default manager config loading and default session creation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigurationError } from '@asset-session/contracts';
import {
  DEFAULT_CONFIG_ENV_VAR,
  createDefaultSession,
  loadDefaultManagerConfig,
} from '../config/default-config.js';
import {
  createMockHostInterface,
  createMockLogger,
  createMockManagerFactory,
  createMockManagerInterface,
} from './test-mocks.js';

describe('default manager config', () => {
  let tmpDir: string;

  function writeConfig(name: string, content: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content, 'utf8');
    return file;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asset-session-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('loadDefaultManagerConfig', () => {
    it('should read the identifier and settings', () => {
      const file = writeConfig(
        'session.json',
        JSON.stringify({
          manager: { identifier: 'org.example.manager', settings: { depth: 2, readOnly: true } },
        })
      );

      expect(loadDefaultManagerConfig(file)).toEqual({
        identifier: 'org.example.manager',
        settings: { depth: 2, readOnly: true },
      });
    });

    it('should default to empty settings', () => {
      const file = writeConfig('session.json', '{"manager": {"identifier": "org.example.manager"}}');

      expect(loadDefaultManagerConfig(file).settings).toEqual({});
    });

    it('should expand ${config_dir} in string settings', () => {
      const file = writeConfig(
        'session.json',
        JSON.stringify({
          manager: {
            identifier: 'org.example.manager',
            settings: { library: '${config_dir}/library.json', label: 'no token' },
          },
        })
      );

      expect(loadDefaultManagerConfig(file).settings).toEqual({
        library: `${tmpDir}/library.json`,
        label: 'no token',
      });
    });

    it('should throw ConfigurationError for a missing file', () => {
      expect(() => loadDefaultManagerConfig(path.join(tmpDir, 'missing.json'))).toThrow(
        ConfigurationError
      );
    });

    it('should throw ConfigurationError for invalid JSON', () => {
      const file = writeConfig('session.json', '{ not json');

      expect(() => loadDefaultManagerConfig(file)).toThrow(
        `Default manager config '${file}' is not valid JSON`
      );
    });

    it('should throw ConfigurationError when the identifier is missing', () => {
      const file = writeConfig('session.json', '{"manager": {"settings": {}}}');

      expect(() => loadDefaultManagerConfig(file)).toThrow(
        `Default manager config '${file}' is invalid`
      );
    });

    it('should throw ConfigurationError for nested setting values', () => {
      const file = writeConfig(
        'session.json',
        '{"manager": {"identifier": "org.example.manager", "settings": {"paths": ["a"]}}}'
      );

      expect(() => loadDefaultManagerConfig(file)).toThrow(ConfigurationError);
    });
  });

  describe('createDefaultSession', () => {
    it('should return undefined when no config is set', () => {
      const logger = createMockLogger();
      const factory = createMockManagerFactory(createMockManagerInterface());

      const session = createDefaultSession(createMockHostInterface(), logger, factory, { env: {} });

      expect(session).toBeUndefined();
      expect(logger.log).toHaveBeenCalledWith(
        'debugApi',
        `${DEFAULT_CONFIG_ENV_VAR} not set, no default manager configured`
      );
    });

    it('should select the configured manager without instantiating it', () => {
      const file = writeConfig(
        'session.json',
        JSON.stringify({
          manager: { identifier: 'com.manager', settings: { library: '${config_dir}/lib' } },
        })
      );
      const managerInterface = createMockManagerInterface();
      const factory = createMockManagerFactory(managerInterface);

      const session = createDefaultSession(createMockHostInterface(), createMockLogger(), factory, {
        env: { [DEFAULT_CONFIG_ENV_VAR]: file },
      });

      expect(session).toBeDefined();
      expect(factory.managerRegistered).toHaveBeenCalledWith('com.manager');
      expect(factory.instantiate).not.toHaveBeenCalled();

      session?.currentManager();

      expect(factory.instantiate).toHaveBeenCalledWith('com.manager');
      expect(managerInterface.initialize.mock.calls[0]?.[0]).toEqual({ library: `${tmpDir}/lib` });
    });

    it('should prefer an explicit config path over the environment', () => {
      const file = writeConfig('explicit.json', '{"manager": {"identifier": "com.manager"}}');
      const factory = createMockManagerFactory(createMockManagerInterface());

      const session = createDefaultSession(createMockHostInterface(), createMockLogger(), factory, {
        configPath: file,
        env: { [DEFAULT_CONFIG_ENV_VAR]: path.join(tmpDir, 'missing.json') },
      });

      expect(session?.getSettings()).toEqual({ identifier: 'com.manager' });
    });
  });
});
