import { ConfigurationError, OutputError, TransactionParseError } from '@txledger/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExitCodes, exitCodeForError, exitWithCode } from '../exit-codes.js';

describe('exit-codes', () => {
  describe('ExitCodes', () => {
    it('should define SUCCESS as 0', () => {
      expect(ExitCodes.SUCCESS).toBe(0);
    });

    it('should have unique exit codes', () => {
      const codes = Object.values(ExitCodes);
      expect(new Set(codes).size).toBe(codes.length);
    });
  });

  describe('exitCodeForError', () => {
    it('should map configuration errors to CONFIG_ERROR', () => {
      expect(exitCodeForError(new ConfigurationError('no file'))).toBe(11);
    });

    it('should map parse errors to VALIDATION_ERROR', () => {
      expect(exitCodeForError(new TransactionParseError('bad row', 4))).toBe(8);
    });

    it('should map output and unknown errors to GENERAL_ERROR', () => {
      expect(exitCodeForError(new OutputError('EPIPE'))).toBe(1);
      expect(exitCodeForError(new Error('boom'))).toBe(1);
    });
  });

  describe('exitWithCode', () => {
    let processExitSpy: ReturnType<typeof vi.spyOn>;

    beforeEach(() => {
      // Mock process.exit to prevent actual process termination
      processExitSpy = vi.spyOn(process, 'exit').mockImplementation((_code?: number | string | null) => {
        throw new Error('process.exit called');
      }) as never;
    });

    afterEach(() => {
      processExitSpy.mockRestore();
    });

    it('should call process.exit with the provided code', () => {
      expect(() => exitWithCode(ExitCodes.CONFIG_ERROR)).toThrow('process.exit called');
      expect(processExitSpy).toHaveBeenCalledWith(11);
    });
  });
});
