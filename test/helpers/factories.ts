import { openDatabase } from '../../src/db/database';
import { LedgerRepo } from '../../src/db/repo';
import type {
  BankAccount,
  CreditPurchase,
  Loan,
  SavingsGoal,
  Subscription,
  Transaction,
} from '../../src/domain/types';

export function makeRepo(): LedgerRepo {
  return new LedgerRepo(openDatabase(':memory:'));
}

export function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 1,
    kind: 'expense',
    category: 'Food',
    amount: 100,
    description: 'test',
    timestamp: '2025-01-15 12:00',
    ...overrides,
  };
}

export function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return { id: 1, name: 'Music', monthlyAmount: 10, billingDay: 5, active: true, ...overrides };
}

export function makeLoan(overrides: Partial<Loan> = {}): Loan {
  return {
    id: 1,
    lender: 'Test Bank',
    principal: 1000,
    amountPaid: 0,
    monthlyInstallment: 100,
    dueDay: 10,
    startDate: '2025-01-01',
    status: 'active',
    active: true,
    ...overrides,
  };
}

export function makeCredit(overrides: Partial<CreditPurchase> = {}): CreditPurchase {
  return {
    id: 1,
    description: 'Laptop',
    lender: 'Test Card',
    principal: 1200,
    termMonths: 12,
    monthlyInstallment: 100,
    monthsPaid: 0,
    purchaseDate: '2025-01-01',
    monthlyInterestRate: 0,
    status: 'active',
    paid: false,
    ...overrides,
  };
}

export function makeGoal(overrides: Partial<SavingsGoal> = {}): SavingsGoal {
  return {
    id: 1,
    name: 'Holiday',
    targetAmount: 100,
    currentAmount: 0,
    startDate: '2025-01-01',
    status: 'active',
    completed: false,
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<BankAccount> = {}): BankAccount {
  return {
    id: 1,
    bankName: 'Test Bank',
    accountType: 'debit',
    balance: 0,
    creditLimit: 0,
    createdDate: '2025-01-01',
    active: true,
    ...overrides,
  };
}
