import { Amount } from '../utils/money.util';

export const MONTH_LABELS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

export interface RevenueEntry {
  amount: Amount;
  createdAt: Date;
}

export interface MonthlyRevenue {
  year: number;
  labels: string[];
  /**
   * Index 0 is January, index 11 is December
   */
  data: number[];
  total: number;
}
