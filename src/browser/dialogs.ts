// ── Dialog source ────────────────────────────────────────────

/** Anything that announces JavaScript dialogs, such as a Playwright `Page`. */
export interface DialogSource {
  once(event: 'dialog', listener: () => void): unknown;
  off(event: 'dialog', listener: () => void): unknown;
}

// ── Gate ─────────────────────────────────────────────────────

/**
 * Lets input actions return while a dialog they opened is still up.
 *
 * An open dialog freezes the page, so the click or key press that opened it
 * does not settle until the dialog is handled. `run` resolves as soon as a
 * dialog opens; the interrupted action is picked up again by `resume` once
 * the dialog has been accepted or dismissed, and its failure surfaces there.
 */
export class DialogGate {
  private interrupted: Promise<void> | undefined;

  constructor(private readonly source: DialogSource) {}

  get isInterrupted(): boolean {
    return this.interrupted !== undefined;
  }

  run(action: Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onDialog = (): void => {
        this.interrupted = action;
        resolve();
      };
      this.source.once('dialog', onDialog);

      action.then(
        () => {
          this.source.off('dialog', onDialog);
          resolve();
        },
        (err: unknown) => {
          this.source.off('dialog', onDialog);
          reject(err);
        },
      );
    });
  }

  /** Wait for the interrupted action, if any. Call once no dialog is open. */
  async resume(): Promise<void> {
    const action = this.interrupted;
    if (action === undefined) return;
    this.interrupted = undefined;
    await this.run(action);
  }
}
