import { describe, it, expect } from 'vitest';
import { ErrorHandler } from '../errorHandler.js';
import {
  ConfigurationError,
  ExtractionError,
  InputError,
  PageLoadError,
  ReportError,
  SnapshotError,
} from '../../types/errors.js';

describe('ErrorHandler.handle', () => {
  it('maps fatal errors to exit code 1', () => {
    expect(ErrorHandler.handle(new SnapshotError('albums-2026-10-19.json is not valid JSON'))).toBe(1);
    expect(ErrorHandler.handle(new ReportError('cannot write report'))).toBe(1);
    expect(ErrorHandler.handle(new InputError('no saved pages'))).toBe(1);
    expect(ErrorHandler.handle(new ConfigurationError('bad threshold'))).toBe(1);
  });

  it('maps per-file errors to exit code 0', () => {
    expect(ErrorHandler.handle(new PageLoadError('list.mhtml: file is empty'))).toBe(0);
    expect(ErrorHandler.handle(new ExtractionError('unknown layout'))).toBe(0);
  });

  it('maps anything else to exit code 1', () => {
    expect(ErrorHandler.handle(new Error('x'))).toBe(1);
    expect(ErrorHandler.handle('plain string')).toBe(1);
  });
});

describe('ErrorHandler.describe', () => {
  it('prefers the error message', () => {
    expect(ErrorHandler.describe(new SnapshotError('broken'))).toBe('Snapshot Error: broken');
    expect(ErrorHandler.describe(42)).toBe('42');
  });
});
