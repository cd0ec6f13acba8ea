/**
 * Input boundary. Every user-supplied value passes through one of these
 * schemas before any store mutation; failures come back as field messages.
 */
import { z } from 'zod';

export interface FieldError {
  field: string;
  message: string;
}

export type Validated<T> = { ok: true; value: T } | { ok: false; errors: FieldError[] };

const text = (label: string) =>
  z.string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
    .trim()
    .min(1, `${label} is required`);

/** Numeric text is read as a number; anything else must already be one */
function fromText(value: unknown): unknown {
  return typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
}

const num = (label: string) =>
  z.number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` });

const money = (label: string) =>
  z.preprocess(fromText, num(label).finite(`${label} must be a number`).positive(`${label} must be greater than zero`));

const dayOfMonth = (label: string) =>
  z.preprocess(
    fromText,
    num(label)
      .int(`${label} must be a whole number`)
      .min(1, `${label} must be between 1 and 31`)
      .max(31, `${label} must be between 1 and 31`),
  );

const rowId = (label: string) =>
  z.preprocess(fromText, num(label).int(`${label} must be a whole number`).positive(`${label} is required`));

/** Longest credit term accepted, in months */
export const MAX_TERM_MONTHS = 600;

const optionalText = z.string().trim().default('');

export const transactionSchema = z.object({
  kind: z.enum(['income', 'expense'], { errorMap: () => ({ message: 'Type must be income or expense' }) }),
  category: text('Category'),
  amount: money('Amount'),
  description: optionalText,
});

/** Creation may post the amount to a bank account: income credits it, expense debits it */
export const newTransactionSchema = transactionSchema.extend({
  accountId: rowId('Account').optional(),
});

export const subscriptionSchema = z.object({
  name: text('Name'),
  monthlyAmount: money('Amount'),
  billingDay: dayOfMonth('Billing day'),
});

export const loanSchema = z.object({
  lender: text('Lender'),
  principal: money('Total amount'),
  monthlyInstallment: money('Monthly installment'),
  dueDay: dayOfMonth('Due day'),
});

export const creditSchema = z.object({
  description: text('Description'),
  lender: text('Lender'),
  principal: money('Total amount'),
  termMonths: z.preprocess(
    fromText,
    num('Months')
      .int('Months must be a whole number')
      .positive('Months must be greater than zero')
      .max(MAX_TERM_MONTHS, `Months must be at most ${MAX_TERM_MONTHS}`),
  ),
  monthlyInterestRate: z.preprocess(
    fromText,
    num('Interest rate')
      .finite('Interest rate must be a number')
      .min(0, 'Interest rate cannot be negative')
      .max(100, 'Interest rate must be at most 100'),
  ).default(0),
});

export const savingsGoalSchema = z.object({
  name: text('Name'),
  targetAmount: money('Target amount'),
});

const accountType = z.enum(['debit', 'credit', 'savings', 'investment'], {
  errorMap: () => ({ message: 'Account type must be debit, credit, savings or investment' }),
});

const creditLimit = z.preprocess(
  fromText,
  num('Credit limit').finite('Credit limit must be a number').min(0, 'Credit limit cannot be negative'),
).default(0);

const balance = z.preprocess(fromText, num('Balance').finite('Balance must be a number'));

export const bankAccountSchema = z.object({
  bankName: text('Bank name'),
  accountType,
  initialBalance: balance.default(0),
  creditLimit,
});

export const bankAccountEditSchema = z.object({
  bankName: text('Bank name'),
  accountType,
  creditLimit,
});

export const balanceSchema = z.object({
  balance,
});

export const budgetSchema = z.object({
  category: text('Category'),
  limit: money('Limit'),
});

export const amountSchema = z.object({
  amount: money('Amount'),
});

export const transferSchema = z
  .object({
    sourceAccountId: rowId('Source account'),
    destinationAccountId: rowId('Destination account'),
    amount: money('Amount'),
    description: optionalText,
  })
  .refine((t) => t.sourceAccountId !== t.destinationAccountId, {
    message: 'Source and destination accounts must differ',
    path: ['destinationAccountId'],
  });

export const pinSchema = z.object({
  pin: z.string({ required_error: 'PIN is required' }).regex(/^\d{4}$/, 'PIN must be exactly 4 digits'),
});

export const themeSchema = z.object({
  theme: z.enum(['light', 'dark'], { errorMap: () => ({ message: 'Theme must be light or dark' }) }),
});

export type TransactionInput = z.output<typeof transactionSchema>;
export type NewTransactionInput = z.output<typeof newTransactionSchema>;
export type SubscriptionInput = z.output<typeof subscriptionSchema>;
export type LoanInput = z.output<typeof loanSchema>;
export type CreditInput = z.output<typeof creditSchema>;
export type SavingsGoalInput = z.output<typeof savingsGoalSchema>;
export type BankAccountInput = z.output<typeof bankAccountSchema>;
export type BankAccountEdit = z.output<typeof bankAccountEditSchema>;
export type BudgetInput = z.output<typeof budgetSchema>;
export type TransferInput = z.output<typeof transferSchema>;

export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): Validated<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return {
    ok: false,
    errors: result.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    })),
  };
}
