import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CONFIG_ENV_KEY,
  checkConfigFile,
  defaultConfig,
  defaultStorePath,
  expandHome,
  findDotenv,
  getConfigValue,
  loadConfig,
  mergeConfig,
  readConfigFile,
  userConfigPath,
  writeConfigFile,
} from '../src/config';
import { ConfigError } from '../src/types';

describe('configuration', () => {
  let dir: string;
  let env: Record<string, string | undefined>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tock-config-'));
    env = { HOME: dir };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const writeUserConfig = (text: string) => {
    const path = userConfigPath(env);
    mkdirSync(join(dir, '.config', 'tock'), { recursive: true });
    writeFileSync(path, text);
    return path;
  };

  describe('paths', () => {
    test('user file lives under ~/.config', () => {
      expect(userConfigPath(env)).toBe(join(dir, '.config', 'tock', 'config.yaml'));
    });

    test('XDG_CONFIG_HOME moves the user file', () => {
      expect(userConfigPath({ XDG_CONFIG_HOME: '/xdg' })).toBe('/xdg/tock/config.yaml');
    });

    test('store path follows the backend', () => {
      expect(defaultStorePath('yaml', env)).toBe(
        join(dir, '.local', 'share', 'tock', 'records.yaml')
      );
      expect(defaultStorePath('sqlite', { XDG_DATA_HOME: '/data' })).toBe('/data/tock/records.db');
    });

    test('expandHome', () => {
      expect(expandHome('~', env)).toBe(dir);
      expect(expandHome('~/notes/x.yaml', env)).toBe(join(dir, 'notes', 'x.yaml'));
      expect(expandHome('/abs/x.yaml', env)).toBe('/abs/x.yaml');
    });
  });

  describe('loadConfig', () => {
    test('defaults when no file exists', () => {
      const { config, files } = loadConfig({ env, cwd: dir, dotenv: false });

      expect(files).toEqual([]);
      expect(config).toEqual(defaultConfig(env));
      expect(config.store.path).toBe(join(dir, '.local', 'share', 'tock', 'records.yaml'));
      expect(config.defaults.task).toBe('');
      expect(config.report).toEqual({ format: 'csv', granularity: 'task' });
    });

    test('user file overrides defaults', () => {
      const path = writeUserConfig('defaults:\n  task: admin\nreport:\n  format: html\n');

      const { config, files } = loadConfig({ env, cwd: dir, dotenv: false });

      expect(files).toEqual([path]);
      expect(config.defaults.task).toBe('admin');
      expect(config.report.format).toBe('html');
      expect(config.report.granularity).toBe('task');
    });

    test('the environment file overrides the user file', () => {
      writeUserConfig('defaults:\n  task: admin\nlog:\n  level: info\n');
      const envFile = join(dir, 'project.yaml');
      writeFileSync(envFile, 'defaults:\n  task: project-x\n');
      env[CONFIG_ENV_KEY] = envFile;

      const { config, files } = loadConfig({ env, cwd: dir, dotenv: false });

      expect(files).toHaveLength(2);
      expect(config.defaults.task).toBe('project-x');
      expect(config.log.level).toBe('info');
    });

    test('an explicit file is applied last', () => {
      const envFile = join(dir, 'project.yaml');
      writeFileSync(envFile, 'report:\n  granularity: record\n');
      env[CONFIG_ENV_KEY] = envFile;
      const explicit = join(dir, 'explicit.yaml');
      writeFileSync(explicit, 'report:\n  granularity: task\n  format: json\n');

      const { config, files } = loadConfig({ env, cwd: dir, dotenv: false, file: explicit });

      expect(files).toEqual([envFile, explicit]);
      expect(config.report).toEqual({ format: 'json', granularity: 'task' });
    });

    test('a missing explicit file is an error', () => {
      expect(() =>
        loadConfig({ env, cwd: dir, dotenv: false, file: join(dir, 'nope.yaml') })
      ).toThrow(ConfigError);
    });

    test('a missing environment file is skipped', () => {
      env[CONFIG_ENV_KEY] = join(dir, 'nope.yaml');
      const { files } = loadConfig({ env, cwd: dir, dotenv: false });
      expect(files).toEqual([]);
    });

    test('an invalid file is an error', () => {
      writeUserConfig('report:\n  format: pdf\n');
      expect(() => loadConfig({ env, cwd: dir, dotenv: false })).toThrow(ConfigError);
    });

    test('relative and ~ store paths are resolved', () => {
      writeUserConfig('store:\n  path: ~/tracking/records.yaml\n');
      const { config } = loadConfig({ env, cwd: dir, dotenv: false });
      expect(config.store.path).toBe(join(dir, 'tracking', 'records.yaml'));
    });

    test('the dotenv file can name the configuration file', () => {
      const project = join(dir, 'project');
      const nested = join(project, 'src');
      mkdirSync(nested, { recursive: true });
      writeFileSync(join(project, 'tock.yaml'), 'defaults:\n  task: from-dotenv\n');
      writeFileSync(join(project, '.tock.env'), `${CONFIG_ENV_KEY}=${join(project, 'tock.yaml')}\n`);

      const { config } = loadConfig({ env, cwd: nested });

      expect(env[CONFIG_ENV_KEY]).toBe(join(project, 'tock.yaml'));
      expect(config.defaults.task).toBe('from-dotenv');
    });

    test('the shell environment wins over the dotenv file', () => {
      writeFileSync(join(dir, '.tock.env'), `${CONFIG_ENV_KEY}=${join(dir, 'dotenv.yaml')}\n`);
      env[CONFIG_ENV_KEY] = join(dir, 'shell.yaml');
      writeFileSync(join(dir, 'shell.yaml'), 'defaults:\n  task: shell\n');

      const { config } = loadConfig({ env, cwd: dir });
      expect(config.defaults.task).toBe('shell');
    });
  });

  describe('mergeConfig', () => {
    test('switching to sqlite moves the default store path', () => {
      const config = mergeConfig(defaultConfig(env), [{ store: { backend: 'sqlite' } }], env, dir);
      expect(config.store).toEqual({
        backend: 'sqlite',
        path: join(dir, '.local', 'share', 'tock', 'records.db'),
      });
    });

    test('an explicit path is kept with a backend change', () => {
      const config = mergeConfig(
        defaultConfig(env),
        [{ store: { path: 'data/time.db' } }, { store: { backend: 'sqlite' } }],
        env,
        dir
      );
      expect(config.store.path).toBe(join(dir, 'data', 'time.db'));
    });

    test('a null default task is ignored', () => {
      const config = mergeConfig(defaultConfig(env), [{ defaults: { task: null } }], env, dir);
      expect(config.defaults.task).toBe('');
    });
  });

  describe('checkConfigFile', () => {
    test('a valid file has no issues', () => {
      const path = join(dir, 'ok.yaml');
      writeFileSync(path, '# mine\nstore:\n  backend: sqlite\nlog:\n  level: debug\n');
      expect(checkConfigFile(path)).toEqual([]);
    });

    test('reports unknown keys and bad values', () => {
      const path = join(dir, 'bad.yaml');
      const text = 'report:\n  format: pdf\ncolour: blue\n';
      writeFileSync(path, text);

      const issues = checkConfigFile(path);

      expect(issues).toHaveLength(2);
      expect(issues.some((issue) => issue.startsWith('report.format: '))).toBe(true);
      expect(readFileSync(path, 'utf-8')).toBe(text);
    });

    test('reports YAML syntax errors', () => {
      const path = join(dir, 'broken.yaml');
      writeFileSync(path, 'store: [unclosed\n');
      expect(checkConfigFile(path).length).toBeGreaterThan(0);
    });

    test('reports a missing file', () => {
      const path = join(dir, 'missing.yaml');
      expect(checkConfigFile(path)).toEqual([`${path} does not exist`]);
    });
  });

  describe('writeConfigFile', () => {
    test('materializes a configuration that reads back the same', () => {
      const path = join(dir, 'nested', 'config.yaml');
      const config = defaultConfig(env);

      writeConfigFile(path, config);

      expect(checkConfigFile(path)).toEqual([]);
      expect(readFileSync(path, 'utf-8').startsWith('# tock configuration\n')).toBe(true);
      expect(readConfigFile(path)).toEqual(config);
    });

    test('refuses to overwrite without force', () => {
      const path = join(dir, 'config.yaml');
      writeFileSync(path, 'defaults:\n  task: keep\n');

      expect(() => writeConfigFile(path, defaultConfig(env))).toThrow(ConfigError);
      expect(readFileSync(path, 'utf-8')).toBe('defaults:\n  task: keep\n');

      writeConfigFile(path, defaultConfig(env), { force: true });
      expect(readConfigFile(path).defaults?.task).toBe('');
    });
  });

  describe('getConfigValue', () => {
    const config = () => defaultConfig(env);

    test('dotted keys', () => {
      expect(getConfigValue(config(), 'report.format')).toBe('csv');
      expect(getConfigValue(config(), 'store')).toEqual(config().store);
    });

    test('segmented keys', () => {
      expect(getConfigValue(config(), ['report', 'granularity'])).toBe('task');
      expect(getConfigValue(config(), ['store.backend'])).toBe('yaml');
    });

    test('defaults for missing keys', () => {
      expect(getConfigValue(config(), 'report.colour', { default: 'blue' })).toBe('blue');
      expect(getConfigValue(config(), 'nope', { default: undefined })).toBeUndefined();
    });

    test('missing keys without a default', () => {
      expect(() => getConfigValue(config(), 'report.colour')).toThrow(
        'Unknown configuration key "report.colour"'
      );
      expect(() => getConfigValue(config(), 'report.format.deeper')).toThrow(ConfigError);
    });

    test('empty keys', () => {
      expect(() => getConfigValue(config(), '')).toThrow(ConfigError);
      expect(() => getConfigValue(config(), 'report.')).toThrow(ConfigError);
    });
  });

  test('findDotenv walks up to the root', () => {
    expect(findDotenv(dir, '.tock-test-not-here.env')).toBeUndefined();
    writeFileSync(join(dir, '.tock.env'), '');
    const nested = join(dir, 'a', 'b');
    mkdirSync(nested, { recursive: true });
    expect(findDotenv(nested)).toBe(join(dir, '.tock.env'));
    expect(existsSync(join(nested, '.tock.env'))).toBe(false);
  });
});
