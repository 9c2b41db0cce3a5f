import { SimEvent } from "./SimEvent";

/** Read side of a completion flag, handed to observers. */
export interface CompletionView {
  isSet(): boolean;
  /** Resolves on the next change of the flag. */
  changed(): Promise<void>;
}

/**
 * One-shot boolean cell: false until its single writer sets it, true forever
 * after.
 */
export class CompletionFlag implements CompletionView {
  private value: boolean = false;
  private readonly changeEvent = new SimEvent();

  isSet(): boolean {
    return this.value;
  }

  changed(): Promise<void> {
    return this.changeEvent.wait();
  }

  set(): void {
    if (this.value) {
      throw new Error("Completion flag is already set");
    }
    this.value = true;
    this.changeEvent.notify();
  }
}
