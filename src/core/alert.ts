import type { DialogRef, DialogType } from '../browser/driver.js';

/**
 * An open `alert`, `confirm` or `prompt` dialog.
 * Text given to `sendKeys` is submitted by `accept`.
 */
export class Alert {
  constructor(private readonly dialog: DialogRef) {}

  get text(): string {
    return this.dialog.message;
  }

  get type(): DialogType {
    return this.dialog.type;
  }

  sendKeys(text: string): this {
    this.dialog.setPromptText(text);
    return this;
  }

  accept(): Promise<void> {
    return this.dialog.accept();
  }

  dismiss(): Promise<void> {
    return this.dialog.dismiss();
  }
}
