/** Card shown before the user picks one. */
export const DEFAULT_CARD_ID = 'ecc1027a-8c07-44a0-bdde-fa2844cff694'

/** The selected card id, kept across render passes. */
export class SelectionState {
  private current: string

  constructor(initial: string = DEFAULT_CARD_ID) {
    this.current = initial
  }

  get selectedCardId(): string {
    return this.current
  }

  /** Returns true when the selection changed. */
  select(cardId: string): boolean {
    if (cardId === this.current) return false
    this.current = cardId
    return true
  }
}
