import { ConfigStore } from '../src/core/config-store';
import { LauncherConfig } from '../src/types/config';
import { MemoryHostSystem, spyOnConsole } from './helpers';

const CONFIG_PATH = '/GODOT/Gdrun/Gdrun.json';

describe('ConfigStore', () => {
  let host: MemoryHostSystem;
  let store: ConfigStore;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    host = new MemoryHostSystem();
    store = new ConfigStore(host);
    logSpy = spyOnConsole().log;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('load', () => {
    it('should return the empty config when the file is missing', async () => {
      const config = await store.load(CONFIG_PATH);

      expect(config).toEqual(ConfigStore.empty());
      expect(logSpy).toHaveBeenCalledWith('ℹ', `No configuration found at ${CONFIG_PATH}, starting with defaults`);
    });

    it('should fall back to the empty config on invalid JSON', async () => {
      host.addFile(CONFIG_PATH, { content: '{ not json' });

      const config = await store.load(CONFIG_PATH);

      expect(config).toEqual({ rootDirectory: null, defaultExecutables: {} });
      expect(logSpy).toHaveBeenCalledWith('⚠', expect.stringContaining('Failed to read configuration, using defaults'));
    });

    it.each([
      ['null', 'null'],
      ['an array', '[]'],
      ['a numeric root directory', '{"rootDirectory": 5}'],
      ['a non-string executable path', '{"rootDirectory": "/GODOT", "defaultExecutables": {"4.2-stable": 1}}']
    ])('should reject a document with %s as a whole', async (_label, content) => {
      host.addFile(CONFIG_PATH, { content });

      const config = await store.load(CONFIG_PATH);

      expect(config).toEqual(ConfigStore.empty());
      expect(logSpy).toHaveBeenCalledWith('⚠', expect.stringContaining(`Invalid configuration in ${CONFIG_PATH}`));
    });

    it('should name the offending field in the warning', async () => {
      host.addFile(CONFIG_PATH, { content: '{"rootDirectory": 5}' });

      await store.load(CONFIG_PATH);

      expect(logSpy).toHaveBeenCalledWith('⚠', expect.stringContaining('(rootDirectory: '));
    });

    it('should fall back when the file cannot be read', async () => {
      host.addFile(CONFIG_PATH);
      jest.spyOn(host, 'readFile').mockRejectedValue(new Error('EACCES: permission denied'));

      const config = await store.load(CONFIG_PATH);

      expect(config).toEqual(ConfigStore.empty());
      expect(logSpy).toHaveBeenCalledWith('⚠', 'Failed to read configuration, using defaults: EACCES: permission denied');
    });

    it('should fill in missing fields', async () => {
      host.addFile(CONFIG_PATH, { content: '{"defaultExecutables": {"4.2-stable": "/missing/path"}}' });

      const config = await store.load(CONFIG_PATH);

      expect(config).toEqual({
        rootDirectory: null,
        defaultExecutables: { '4.2-stable': '/missing/path' }
      });
    });

    it('should treat an empty object as the empty config', async () => {
      host.addFile(CONFIG_PATH, { content: '{}' });

      expect(await store.load(CONFIG_PATH)).toEqual(ConfigStore.empty());
    });

    it('should ignore unknown keys', async () => {
      host.addFile(CONFIG_PATH, { content: '{"rootDirectory": "/GODOT", "theme": "dark"}' });

      expect(await store.load(CONFIG_PATH)).toEqual({ rootDirectory: '/GODOT', defaultExecutables: {} });
    });
  });

  describe('save', () => {
    const config: LauncherConfig = {
      rootDirectory: '/GODOT',
      defaultExecutables: {
        '4.2-stable': '/GODOT/4.2-stable/godot',
        '3.5': '/GODOT/3.5/godot_console'
      }
    };

    it('should write indented JSON with sorted version keys', async () => {
      const result = await store.save(CONFIG_PATH, config);

      expect(result).toEqual({ success: true });
      expect(host.contentOf(CONFIG_PATH)).toBe(
        [
          '{',
          '  "rootDirectory": "/GODOT",',
          '  "defaultExecutables": {',
          '    "3.5": "/GODOT/3.5/godot_console",',
          '    "4.2-stable": "/GODOT/4.2-stable/godot"',
          '  }',
          '}',
          ''
        ].join('\n')
      );
      expect(logSpy).toHaveBeenCalledWith('✓', `Configuration saved to ${CONFIG_PATH}`);
    });

    it('should load back exactly what was saved', async () => {
      await store.save(CONFIG_PATH, config);

      expect(await store.load(CONFIG_PATH)).toEqual(config);
    });

    it('should round-trip the empty config', async () => {
      await store.save(CONFIG_PATH, ConfigStore.empty());

      expect(host.contentOf(CONFIG_PATH)).toBe('{\n  "rootDirectory": null,\n  "defaultExecutables": {}\n}\n');
      expect(await store.load(CONFIG_PATH)).toEqual(ConfigStore.empty());
    });

    it('should report a write failure without throwing', async () => {
      host.writeError = new Error('EROFS: read-only file system');
      const before = JSON.parse(JSON.stringify(config));

      const result = await store.save(CONFIG_PATH, config);

      expect(result).toEqual({ success: false, error: 'EROFS: read-only file system' });
      expect(logSpy).toHaveBeenCalledWith('⚠', 'Could not save configuration: EROFS: read-only file system');
      expect(config).toEqual(before);
      expect(host.files.has(CONFIG_PATH)).toBe(false);
    });
  });

  describe('rememberExecutable', () => {
    it('should overwrite the entry for a version without touching the original', () => {
      const original: LauncherConfig = {
        rootDirectory: '/GODOT',
        defaultExecutables: { '4.2-stable': '/GODOT/4.2-stable/godot', '3.5': '/GODOT/3.5/godot' }
      };

      const updated = ConfigStore.rememberExecutable(original, '4.2-stable', '/GODOT/4.2-stable/godot_console');

      expect(updated).toEqual({
        rootDirectory: '/GODOT',
        defaultExecutables: { '4.2-stable': '/GODOT/4.2-stable/godot_console', '3.5': '/GODOT/3.5/godot' }
      });
      expect(original.defaultExecutables['4.2-stable']).toBe('/GODOT/4.2-stable/godot');
    });

    it('should keep a version named __proto__ as a saved entry', async () => {
      const config = ConfigStore.rememberExecutable(ConfigStore.empty(), '__proto__', '/GODOT/__proto__/godot');

      await store.save(CONFIG_PATH, config);

      expect(host.contentOf(CONFIG_PATH)).toBe(
        '{\n  "rootDirectory": null,\n  "defaultExecutables": {\n    "__proto__": "/GODOT/__proto__/godot"\n  }\n}\n'
      );
    });
  });

  describe('rememberedExecutable', () => {
    it('should return the entry stored for a version', () => {
      const config = ConfigStore.rememberExecutable(ConfigStore.empty(), '4.2-stable', '/GODOT/4.2-stable/godot');

      expect(ConfigStore.rememberedExecutable(config, '4.2-stable')).toBe('/GODOT/4.2-stable/godot');
      expect(ConfigStore.rememberedExecutable(config, '3.5')).toBeUndefined();
    });

    it.each(['constructor', 'toString', 'hasOwnProperty', '__proto__'])(
      'should not mistake the inherited %s member for an entry',
      versionIdentifier => {
        expect(ConfigStore.rememberedExecutable(ConfigStore.empty(), versionIdentifier)).toBeUndefined();
      }
    );
  });
});
