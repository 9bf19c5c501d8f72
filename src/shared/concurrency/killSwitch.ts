export type KillReason = "quiescent" | "external" | "unrecoverable";

type KillListener = (reason: KillReason) => void;

/**
 * Close-once broadcast signal. Closing twice is a no-op and the first
 * reason wins; listeners added after closing are called right away.
 */
export class KillSwitch {
  private reasonValue?: KillReason;
  private readonly listeners: KillListener[] = [];

  get isClosed(): boolean {
    return this.reasonValue !== undefined;
  }

  get reason(): KillReason | undefined {
    return this.reasonValue;
  }

  close(reason: KillReason): boolean {
    if (this.reasonValue !== undefined) return false;

    this.reasonValue = reason;
    for (const listener of this.listeners.splice(0)) {
      listener(reason);
    }
    return true;
  }

  onClose(listener: KillListener): void {
    if (this.reasonValue !== undefined) {
      listener(this.reasonValue);
      return;
    }
    this.listeners.push(listener);
  }
}
