/** Default category list offered when entering a transaction */
export const CATEGORIES = [
  'Food',
  'Transport',
  'Utilities',
  'Leisure',
  'Health',
  'Salary',
  'Shopping',
  'Education',
  'Other',
] as const;

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? '';
}
