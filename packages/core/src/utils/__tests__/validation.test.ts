import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../errors';
import { validateConnectionConfig, validateIdentifier, validateSQL } from '../validation';

describe('validateConnectionConfig', () => {
  it('should accept a network config with host and database', () => {
    expect(() => validateConnectionConfig({ host: 'localhost', database: 'app' })).not.toThrow();
  });

  it('should accept a connection string alone', () => {
    expect(() =>
      validateConnectionConfig({ connectionString: 'postgres://localhost/app' }),
    ).not.toThrow();
  });

  it('should require host and database', () => {
    expect(() => validateConnectionConfig({ database: 'app' })).toThrow('Host is required');
    expect(() => validateConnectionConfig({ host: 'localhost' })).toThrow(
      'Database name is required',
    );
  });

  it('should reject out-of-range ports', () => {
    expect(() => validateConnectionConfig({ host: 'h', database: 'd', port: 70_000 })).toThrow(
      ValidationError,
    );
  });

  it('should reject a non-positive pool size', () => {
    expect(() =>
      validateConnectionConfig({ host: 'h', database: 'd', pool: { max: 0 } }),
    ).toThrow('Pool size must be a positive number');
  });

  it('should reject negative timeouts', () => {
    expect(() =>
      validateConnectionConfig({ host: 'h', database: 'd', connectionTimeout: -1 }),
    ).toThrow(ValidationError);
    expect(() => validateConnectionConfig({ host: 'h', database: 'd', idleTimeout: -1 })).toThrow(
      ValidationError,
    );
  });

  it('should require a filename for file targets only', () => {
    expect(() => validateConnectionConfig({ filename: ':memory:' }, 'file')).not.toThrow();
    expect(() => validateConnectionConfig({ host: 'h' }, 'file')).toThrow('Filename is required');
  });

  it('should accept readonly only for file targets', () => {
    expect(() =>
      validateConnectionConfig({ filename: 'app.db', readonly: true }, 'file'),
    ).not.toThrow();
    expect(() => validateConnectionConfig({ host: 'h', database: 'd', readonly: true })).toThrow(
      new ValidationError('readonly is only supported for file-backed databases', 'readonly'),
    );
  });
});

describe('validateSQL', () => {
  it('should reject blank SQL', () => {
    expect(() => validateSQL('   ')).toThrow(ValidationError);
    expect(() => validateSQL('SELECT 1')).not.toThrow();
  });
});

describe('validateIdentifier', () => {
  it('should accept plain identifiers', () => {
    expect(() => validateIdentifier('user_accounts', 'table')).not.toThrow();
    expect(() => validateIdentifier('_id$2', 'column')).not.toThrow();
  });

  it('should reject identifiers with quotes, spaces or a leading digit', () => {
    expect(() => validateIdentifier('users"; DROP', 'table')).toThrow(ValidationError);
    expect(() => validateIdentifier('first name', 'column')).toThrow(ValidationError);
    expect(() => validateIdentifier('1st', 'column')).toThrow(ValidationError);
  });
});
