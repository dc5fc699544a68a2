import type { BotSettingsSnapshot } from './types.js';
import type { SettingToggle } from './bot/actions.js';

/**
 * Настройки бота на весь процесс. Начальные значения из конфига,
 * меняются через меню настроек. Сессия ввода берёт снимок при старте.
 */
export class BotSettings {
  private state: BotSettingsSnapshot;

  constructor(initial: BotSettingsSnapshot) {
    this.state = { ...initial };
  }

  snapshot(): BotSettingsSnapshot {
    return { ...this.state };
  }

  toggle(setting: SettingToggle): boolean {
    switch (setting) {
      case 'order_amount':
        this.state.orderAmountEnabled = !this.state.orderAmountEnabled;
        return this.state.orderAmountEnabled;
      case 'split_payment':
        this.state.splitPaymentEnabled = !this.state.splitPaymentEnabled;
        return this.state.splitPaymentEnabled;
    }
  }

  setReminderTime(time: string): void {
    this.state.reminderTime = time;
  }
}
