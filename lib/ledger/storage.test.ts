/**
 * Tests for ledger file storage
 *
 * These tests verify loading, corruption recovery, round-tripping and the
 * atomic save against a real temporary directory
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import type { Ledger } from '@/types/ledger';
import { cleanupTempDir, createTempDataDir } from '../test-utils';
import { LedgerPersistenceError } from './errors';
import {
  getQuarantinePath,
  loadLedger,
  parseLedgerDocument,
  saveLedger,
  serializeLedger,
} from './storage';

const SAMPLE_LEDGER: Ledger = {
  next_id: 4,
  transactions: [
    {
      id: 1,
      type: 'income',
      amount: 1500,
      category: 'Salary',
      date: '2025-11-01',
      notes: null,
      created_at: '2025-11-01T09:00:00.000Z',
      updated_at: null,
    },
    {
      id: 3,
      type: 'expense',
      amount: -12.35,
      category: 'Café',
      date: '2025-11-24',
      notes: 'Lunch',
      created_at: '2025-11-24T12:30:00.000Z',
      updated_at: '2025-11-25T08:00:00.000Z',
    },
  ],
};

describe('Ledger Storage', () => {
  let dir: string;
  let ledgerPath: string;

  beforeEach(() => {
    dir = createTempDataDir('storage');
    ledgerPath = path.join(dir, 'budget_data.json');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTempDir(dir);
  });

  describe('loadLedger', () => {
    it('should return an empty ledger when the file does not exist', () => {
      const result = loadLedger(ledgerPath);

      expect(result).toEqual({ status: 'missing', ledger: { next_id: 1, transactions: [] } });
      expect(fs.existsSync(ledgerPath)).toBe(false);
    });

    it('should load a well-formed document', () => {
      fs.writeFileSync(ledgerPath, JSON.stringify(SAMPLE_LEDGER), 'utf-8');

      const result = loadLedger(ledgerPath);

      expect(result.status).toBe('loaded');
      expect(result.ledger).toEqual(SAMPLE_LEDGER);
    });

    it('should quarantine a file that is not JSON and start empty', () => {
      fs.writeFileSync(ledgerPath, '{ "next_id": 2, "transactions": [', 'utf-8');

      const result = loadLedger(ledgerPath);

      expect(result.status).toBe('recovered');
      expect(result.ledger).toEqual({ next_id: 1, transactions: [] });
      if (result.status === 'recovered') {
        expect(result.quarantinePath).toBe(`${ledgerPath}.corrupt`);
        expect(result.reason).toMatch(/^invalid JSON: /);
      }
      expect(fs.existsSync(ledgerPath)).toBe(false);
      expect(fs.readFileSync(`${ledgerPath}.corrupt`, 'utf-8')).toBe('{ "next_id": 2, "transactions": [');
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('should quarantine JSON that is not a ledger', () => {
      fs.writeFileSync(ledgerPath, '{"next_id": 1}', 'utf-8');

      const result = loadLedger(ledgerPath);

      expect(result.status).toBe('recovered');
      if (result.status === 'recovered') {
        expect(result.reason).toBe('transactions: Required');
      }
      expect(fs.readFileSync(getQuarantinePath(ledgerPath), 'utf-8')).toBe('{"next_id": 1}');
    });

    it('should quarantine a record with an impossible date', () => {
      const doc = { next_id: 2, transactions: [{ ...SAMPLE_LEDGER.transactions[0], date: '2025-02-30' }] };
      fs.writeFileSync(ledgerPath, JSON.stringify(doc), 'utf-8');

      const result = loadLedger(ledgerPath);

      expect(result.status).toBe('recovered');
      if (result.status === 'recovered') {
        expect(result.reason).toBe('transactions.0.date: Date must be a real date in YYYY-MM-DD format');
      }
    });

    it('should start empty when the corrupt file cannot be moved aside', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(fs, 'renameSync').mockImplementationOnce(() => {
        throw new Error('read-only file system');
      });
      fs.writeFileSync(ledgerPath, 'not json at all', 'utf-8');

      const result = loadLedger(ledgerPath);

      expect(result.status).toBe('recovered');
      expect(result.ledger).toEqual({ next_id: 1, transactions: [] });
      if (result.status === 'recovered') {
        expect(result.quarantinePath).toBeNull();
      }
      expect(fs.readFileSync(ledgerPath, 'utf-8')).toBe('not json at all');
      expect(fs.existsSync(`${ledgerPath}.corrupt`)).toBe(false);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('should replace an earlier quarantined file', () => {
      fs.writeFileSync(`${ledgerPath}.corrupt`, 'older garbage', 'utf-8');
      fs.writeFileSync(ledgerPath, 'newer garbage', 'utf-8');

      loadLedger(ledgerPath);

      expect(fs.readFileSync(`${ledgerPath}.corrupt`, 'utf-8')).toBe('newer garbage');
    });
  });

  describe('parseLedgerDocument', () => {
    it('should report duplicate ids with their path', () => {
      const doc = {
        next_id: 5,
        transactions: [SAMPLE_LEDGER.transactions[0], SAMPLE_LEDGER.transactions[0]],
      };

      const result = parseLedgerDocument(JSON.stringify(doc));

      expect(result).toEqual({
        success: false,
        reason: 'transactions.1.id: Duplicate transaction id 1',
      });
    });
  });

  describe('serializeLedger', () => {
    it('should write fields in a fixed order with two-space indent', () => {
      const text = serializeLedger({
        next_id: 2,
        transactions: [
          {
            updated_at: null,
            created_at: '2025-11-01T09:00:00.000Z',
            notes: null,
            date: '2025-11-01',
            category: 'Salary',
            amount: 1500,
            type: 'income',
            id: 1,
          },
        ],
      });

      expect(text).toBe([
        '{',
        '  "next_id": 2,',
        '  "transactions": [',
        '    {',
        '      "id": 1,',
        '      "type": "income",',
        '      "amount": 1500,',
        '      "category": "Salary",',
        '      "date": "2025-11-01",',
        '      "notes": null,',
        '      "created_at": "2025-11-01T09:00:00.000Z",',
        '      "updated_at": null',
        '    }',
        '  ]',
        '}',
        '',
      ].join('\n'));
    });
  });

  describe('saveLedger', () => {
    it('should round-trip a document byte for byte', () => {
      const original = JSON.stringify(SAMPLE_LEDGER, null, 2) + '\n';
      fs.writeFileSync(ledgerPath, original, 'utf-8');

      const { ledger } = loadLedger(ledgerPath);
      saveLedger(ledgerPath, ledger);

      expect(fs.readFileSync(ledgerPath, 'utf-8')).toBe(original);
    });

    it('should round-trip records without notes or updated_at keys', () => {
      const doc = {
        next_id: 2,
        transactions: [
          {
            id: 1,
            type: 'income',
            amount: 1500,
            category: 'Salary',
            date: '2025-11-01',
            created_at: '2025-11-01T09:00:00',
          },
        ],
      };
      const original = JSON.stringify(doc, null, 2) + '\n';
      fs.writeFileSync(ledgerPath, original, 'utf-8');

      const result = loadLedger(ledgerPath);
      saveLedger(ledgerPath, result.ledger);

      expect(result.status).toBe('loaded');
      expect(fs.readFileSync(ledgerPath, 'utf-8')).toBe(original);
    });

    it('should create the data directory if needed', () => {
      const nestedPath = path.join(dir, 'nested', 'budget_data.json');

      saveLedger(nestedPath, SAMPLE_LEDGER);

      expect(loadLedger(nestedPath).ledger).toEqual(SAMPLE_LEDGER);
    });

    it('should leave no temporary files behind', () => {
      saveLedger(ledgerPath, SAMPLE_LEDGER);

      expect(fs.readdirSync(dir)).toEqual(['budget_data.json']);
    });

    it('should leave the original file untouched when the rename fails', () => {
      saveLedger(ledgerPath, SAMPLE_LEDGER);
      const before = fs.readFileSync(ledgerPath, 'utf-8');

      vi.spyOn(fs, 'renameSync').mockImplementationOnce(() => {
        throw new Error('disk full');
      });

      expect(() => saveLedger(ledgerPath, { next_id: 1, transactions: [] })).toThrow(LedgerPersistenceError);
      expect(fs.readFileSync(ledgerPath, 'utf-8')).toBe(before);
      expect(fs.readdirSync(dir)).toEqual(['budget_data.json']);
    });

    it('should describe the failure and keep the cause', () => {
      const cause = new Error('permission denied');
      vi.spyOn(fs, 'renameSync').mockImplementationOnce(() => {
        throw cause;
      });

      let caught: unknown;
      try {
        saveLedger(ledgerPath, SAMPLE_LEDGER);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(LedgerPersistenceError);
      if (caught instanceof LedgerPersistenceError) {
        expect(caught.kind).toBe('PersistenceFailure');
        expect(caught.message).toBe(`Failed to save ledger to ${ledgerPath}: permission denied`);
        expect(caught.cause).toBe(cause);
      }
      expect(fs.existsSync(ledgerPath)).toBe(false);
    });
  });
});
