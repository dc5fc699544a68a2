/** Календарная дата без времени: 'YYYY-MM-DD' */
export type IsoDate = string;

export type ChatId = number | string;

export type BotVariant = 'delivery' | 'payments';

export type StoreBackend = 'json' | 'supabase';

export type ReminderMode = 'daily' | 'one_shot';

export type PaymentCategory = 'duty' | 'delivery' | 'insurance' | 'deposit';

export interface PaymentDetails {
  productCount: number;
  createdAt: string; // ISO timestamp
  dutyPaid: boolean;
  deliveryPaid: boolean;
  insurancePaid: boolean;
  depositPaid: boolean;
}

export interface CustomerRecord {
  key: string;
  targetDate: IsoDate;
  orderAmount: number | null;
  splitPayment: boolean | null;
  notified: boolean;
  payment?: PaymentDetails;
}

export interface PaymentBreakdown {
  duty: number;
  delivery: number;
  insurance: number;
  deposit: number;
}

export interface BotSettingsSnapshot {
  orderAmountEnabled: boolean;
  splitPaymentEnabled: boolean;
  reminderTime: string;
}
