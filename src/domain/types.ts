/**
 * Domain types for the ledger.
 * Pure data types. No DB, no IO.
 */

export type TransactionKind = 'income' | 'expense';

export type AccountType = 'debit' | 'credit' | 'savings' | 'investment';

/** Lifecycle of loans, credit purchases and savings goals */
export type LifecycleStatus = 'active' | 'finished' | 'removed';

export type Theme = 'light' | 'dark';

export interface Transaction {
  id: number;
  kind: TransactionKind;
  category: string;
  amount: number;
  description: string;
  timestamp: string;           // YYYY-MM-DD HH:mm
}

export interface Subscription {
  id: number;
  name: string;
  monthlyAmount: number;
  billingDay: number;          // 1–31
  active: boolean;
}

export interface Loan {
  id: number;
  lender: string;
  principal: number;
  amountPaid: number;
  monthlyInstallment: number;
  dueDay: number;              // 1–31
  startDate: string;           // YYYY-MM-DD
  status: LifecycleStatus;
  active: boolean;             // status === 'active'
}

export interface CreditPurchase {
  id: number;
  description: string;
  lender: string;
  principal: number;
  termMonths: number;
  monthlyInstallment: number;  // stored at creation/edit time
  monthsPaid: number;
  purchaseDate: string;        // YYYY-MM-DD
  monthlyInterestRate: number; // percent per month, 0 = interest-free
  status: LifecycleStatus;
  paid: boolean;               // status !== 'active'
}

export interface SavingsGoal {
  id: number;
  name: string;
  targetAmount: number;
  currentAmount: number;
  startDate: string;
  status: LifecycleStatus;
  completed: boolean;          // status !== 'active'
}

/** Rows as listed, with the payoff figures a list view shows */
export interface LoanView extends Loan {
  progress: number;            // 0..1
  outstanding: number;
  monthsLeft: number;          // whole installments still needed
}

export interface CreditView extends CreditPurchase {
  progress: number;
  monthsRemaining: number;
  balanceRemaining: number;
}

export interface SavingsGoalView extends SavingsGoal {
  progress: number;
  missing: number;             // left to reach the target
}

export interface BankAccount {
  id: number;
  bankName: string;
  accountType: AccountType;
  balance: number;             // may be negative for credit accounts
  creditLimit: number;
  createdDate: string;
  active: boolean;
}

export interface Transfer {
  id: number;
  sourceAccountId: number;
  destinationAccountId: number;
  amount: number;
  timestamp: string;
  description: string;
}

/** Transfer with both account names resolved; null when the account row is gone */
export interface TransferView extends Transfer {
  sourceBankName: string | null;
  destinationBankName: string | null;
}

/** One row per category; the month/year record when it was last saved */
export interface Budget {
  id: number;
  category: string;
  limit: number;
  month: number;
  year: number;
}

export interface Balance {
  income: number;
  expense: number;
  net: number;
}

export interface MonthBalance {
  income: number;
  expense: number;
}

export interface CategoryTotal {
  category: string;
  total: number;
}

export interface TrendPoint {
  monthLabel: string;          // Jan, Feb, …
  year: number;
  income: number;
  expense: number;
}

export interface Obligations {
  subscriptions: number;
  loanInstallments: number;
  creditInstallments: number;
}

export type BudgetState = 'no_limit' | 'under' | 'near' | 'over';

export interface BudgetStatus {
  category: string;
  limit: number | null;
  spent: number;
  ratio: number | null;
  status: BudgetState;
}

export interface Dashboard {
  overall: Balance;
  thisMonth: MonthBalance;
  obligations: Obligations;
  availableFunds: number;
  loanDebt: number;
  creditDebt: number;
  savings: number;
  bankBalance: number;
}

export interface MonthlyReport {
  month: number;
  year: number;
  monthName: string;
  income: number;
  expense: number;
  subscriptions: number;
  loanInstallments: number;
  creditInstallments: number;
  balance: number;             // income − expense
  transactions: Transaction[];
}
