// Zod validation schemas for the budget ledger
import { z } from 'zod';
import { isValid, parse } from 'date-fns';
import { TRANSACTION_TYPES, type TransactionType } from '@/types/ledger';
import { todayYMD } from './utils';

// Date string pattern (YYYY-MM-DD)
const datePattern = /^\d{4}-\d{2}-\d{2}$/;

// Signed or unsigned decimal numeral: 12, -4.5, +.5, 3.
const amountPattern = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

const idPattern = /^\d+$/;

/**
 * Check that a string is YYYY-MM-DD and names a real calendar day.
 */
export function isValidDateString(value: string): boolean {
  if (!datePattern.test(value)) return false;
  return isValid(parse(value, 'yyyy-MM-dd', new Date()));
}

const dateSchema = z.string().refine(isValidDateString, 'Date must be a real date in YYYY-MM-DD format');

// ============================================
// Boundary input schemas (raw strings from the prompt)
// ============================================

export const dateInputSchema = z.string().trim().refine(
  val => val === '' || isValidDateString(val),
  "That's not a valid date. Please use YYYY-MM-DD."
);

export const amountInputSchema = z.string().trim()
  .regex(amountPattern, 'Please enter a number like 1200 or 45.50.')
  .transform(val => Number(val))
  .refine(Number.isFinite, 'Please enter a number like 1200 or 45.50.');

export const typeInputSchema = z.string().trim().toLowerCase()
  .pipe(z.enum(TRANSACTION_TYPES, { message: 'Type must be income or expense.' }));

export const idInputSchema = z.string().trim()
  .regex(idPattern, 'ID must be a number.')
  .transform(val => Number(val))
  .refine(val => val > 0, 'ID must be a positive number.');

// ============================================
// Store input schemas
// ============================================

export const createTransactionSchema = z.object({
  type: z.enum(TRANSACTION_TYPES),
  amount: z.number().finite('Amount must be a finite number'),
  category: z.string().trim().min(1, 'Category is required').max(100, 'Category too long'),
  date: dateSchema.optional(),
  notes: z.string().max(1000, 'Notes too long').nullable().optional(),
});

export const transactionPatchSchema = z.object({
  type: z.enum(TRANSACTION_TYPES).optional(),
  amount: z.number().finite('Amount must be a finite number').optional(),
  category: z.string().trim().min(1, 'Category is required').max(100, 'Category too long').optional(),
  date: dateSchema.optional(),
  notes: z.string().max(1000, 'Notes too long').nullable().optional(),
});

// ============================================
// Persisted document schema
// ============================================

export const transactionRecordSchema = z.object({
  id: z.number().int().positive(),
  type: z.enum(TRANSACTION_TYPES),
  amount: z.number().finite(),
  category: z.string(),
  date: dateSchema,
  notes: z.string().nullable().optional(),
  created_at: z.string(),
  updated_at: z.string().nullable().optional(),
});

export const ledgerDocumentSchema = z.object({
  next_id: z.number().int().positive(),
  transactions: z.array(transactionRecordSchema),
}).superRefine((doc, ctx) => {
  const seen = new Set<number>();
  doc.transactions.forEach((txn, index) => {
    if (seen.has(txn.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate transaction id ${txn.id}`,
        path: ['transactions', index, 'id'],
      });
    }
    seen.add(txn.id);
    if (txn.id >= doc.next_id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Transaction id ${txn.id} is not below next_id ${doc.next_id}`,
        path: ['transactions', index, 'id'],
      });
    }
  });
});

// ============================================
// Parse helpers for untrusted prompt input
// ============================================

export type InputErrorKind = 'InvalidDate' | 'InvalidAmount' | 'InvalidType' | 'InvalidId';

export interface InputError {
  kind: InputErrorKind;
  message: string;
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: InputError };

function toParseResult<T>(
  result: z.SafeParseReturnType<string, T>,
  kind: InputErrorKind
): ParseResult<T> {
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: { kind, message: result.error.issues[0]?.message ?? kind },
  };
}

/**
 * Parse a date string. Empty input means today.
 */
export function parseDateInput(input: string, today: () => string = todayYMD): ParseResult<string> {
  const result = toParseResult(dateInputSchema.safeParse(input), 'InvalidDate');
  if (result.success && result.data === '') {
    return { success: true, data: today() };
  }
  return result;
}

export function parseAmountInput(input: string): ParseResult<number> {
  return toParseResult(amountInputSchema.safeParse(input), 'InvalidAmount');
}

export function parseTypeInput(input: string): ParseResult<TransactionType> {
  return toParseResult(typeInputSchema.safeParse(input), 'InvalidType');
}

export function parseIdInput(input: string): ParseResult<number> {
  return toParseResult(idInputSchema.safeParse(input), 'InvalidId');
}

// Type exports
export type CreateTransactionData = z.infer<typeof createTransactionSchema>;
export type TransactionPatchData = z.infer<typeof transactionPatchSchema>;
export type LedgerDocument = z.infer<typeof ledgerDocumentSchema>;
