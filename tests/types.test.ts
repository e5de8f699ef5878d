import {
  ConfigError,
  CorruptStoreError,
  InvalidTransitionError,
  StoreWriteError,
  TockError,
  ValidationError,
  emptySession,
} from '../src/types';

describe('Error Types', () => {
  test('TockError has correct name', () => {
    const error = new TockError('Test error');
    expect(error.name).toBe('TockError');
    expect(error.message).toBe('Test error');
  });

  test('ValidationError has correct name', () => {
    const error = new ValidationError('Validation failed');
    expect(error.name).toBe('ValidationError');
    expect(error).toBeInstanceOf(TockError);
  });

  test('InvalidTransitionError names the state and the allowed actions', () => {
    const error = new InvalidTransitionError('idle', 'pause', ['start']);
    expect(error.name).toBe('InvalidTransitionError');
    expect(error.message).toBe('Cannot pause while idle. Allowed: start.');
    expect(error.state).toBe('idle');
    expect(error.action).toBe('pause');
    expect(error.allowed).toEqual(['start']);
  });

  test('CorruptStoreError recommends a backup', () => {
    const error = new CorruptStoreError('/tmp/records.yaml', 'bad indentation');
    expect(error.name).toBe('CorruptStoreError');
    expect(error.path).toBe('/tmp/records.yaml');
    expect(error.message).toBe(
      'Store at /tmp/records.yaml is corrupt: bad indentation. ' +
        'Back up the file and remove it to start with an empty store.'
    );
  });

  test('StoreWriteError has correct name', () => {
    const error = new StoreWriteError('/tmp/records.yaml', 'disk full');
    expect(error.name).toBe('StoreWriteError');
    expect(error.message).toBe('Failed to write store at /tmp/records.yaml: disk full');
  });

  test('ConfigError has correct name', () => {
    expect(new ConfigError('nope').name).toBe('ConfigError');
  });
});

describe('emptySession', () => {
  test('has no open record and no history', () => {
    expect(emptySession()).toEqual({ activeRecord: null, history: [] });
  });
});
