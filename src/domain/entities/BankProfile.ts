import { z } from 'zod';

export const DATE_FORMATS = ['YYYY-MM-DD', 'MM/DD/YYYY', 'M/D/YYYY', 'DD/MM/YYYY'] as const;
export type DateFormat = (typeof DATE_FORMATS)[number];

const columnName = z.string().trim().min(1);

export const amountConventionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('signed') }),
  z.object({ kind: z.literal('inverted') }),
  z.object({ kind: z.literal('debit_credit_columns') }),
  z.object({
    kind: z.literal('type_column'),
    debitTypes: z.array(z.string().trim().min(1)).min(1),
  }),
]);

export type AmountConvention = z.infer<typeof amountConventionSchema>;

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

/**
 * Routes a statement to another account of the same institution by its file name
 * (e.g. two cards from one bank exporting the same layout)
 */
export const accountRuleSchema = z.object({
  fileNamePattern: z.string().min(1).refine(isValidPattern, { message: 'fileNamePattern must be a valid regular expression' }),
  accountName: z.string().trim().min(1),
});

export type AccountRule = z.infer<typeof accountRuleSchema>;

export const bankProfileSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9_]+$/, { message: 'id must be lowercase snake_case' }),
    institutionId: z.string().trim().min(1),
    displayName: z.string().trim().min(1),
    accountName: z.string().trim().min(1),
    accountRules: z.array(accountRuleSchema).optional(),
    headerSignature: z.array(columnName).min(1),
    columns: z.object({
      postedDate: columnName,
      description: columnName,
      amount: columnName.optional(),
      debit: columnName.optional(),
      credit: columnName.optional(),
      type: columnName.optional(),
      category: columnName.optional(),
      memo: columnName.optional(),
    }),
    dateFormats: z.array(z.enum(DATE_FORMATS)).min(1),
    amountConvention: amountConventionSchema,
  })
  .superRefine((profile, ctx) => {
    const { columns, amountConvention } = profile;
    if (amountConvention.kind === 'debit_credit_columns') {
      if (!columns.debit || !columns.credit) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns'],
          message: 'debit_credit_columns requires both debit and credit columns',
        });
      }
      return;
    }
    if (!columns.amount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['columns', 'amount'],
        message: `${amountConvention.kind} requires an amount column`,
      });
    }
    if (amountConvention.kind === 'type_column' && !columns.type) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['columns', 'type'],
        message: 'type_column requires a type column',
      });
    }
  });

/**
 * Bank profile - describes one institution's export layout
 * Profiles are plain data; a single generic mapper interprets them
 */
export type BankProfile = z.infer<typeof bankProfileSchema>;

export function normalizeHeader(value: string): string {
  return value.replace(/^\uFEFF/, '').trim().replace(/\s+/g, ' ').toLowerCase();
}
