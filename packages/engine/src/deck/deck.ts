// ─── Deck ──────────────────────────────────────────────────────────
// A draw pile and a discard pile. Drawing from an empty draw pile
// reshuffles the discards back in; with both empty the deck is
// exhausted and draw() yields null.

import type { Card, DeckOrigin } from "@umbral/schema";
import type { SeededRng } from "../engine/prng.js";

export class Deck {
  /** Top of the pile is the last element. */
  private drawPile: Card[];
  private readonly discardPile: Card[] = [];

  constructor(
    readonly origin: DeckOrigin,
    cards: readonly Card[],
    private readonly rng: SeededRng
  ) {
    this.drawPile = rng.shuffle(cards);
  }

  get drawCount(): number {
    return this.drawPile.length;
  }

  get discardCount(): number {
    return this.discardPile.length;
  }

  /** Whether a draw would produce a card (possibly after a reshuffle). */
  get canDraw(): boolean {
    return this.drawPile.length > 0 || this.discardPile.length > 0;
  }

  /** Discarded cards, oldest first. */
  get discards(): readonly Card[] {
    return this.discardPile;
  }

  draw(): Card | null {
    if (this.drawPile.length === 0) {
      if (this.discardPile.length === 0) return null;
      this.drawPile = this.rng.shuffle(this.discardPile);
      this.discardPile.length = 0;
    }
    return this.drawPile.pop() ?? null;
  }

  discard(card: Card): void {
    this.discardPile.push(card);
  }

  /** Removes a specific card from the discard pile (Grave Digger). */
  takeFromDiscard(cardId: string): Card | null {
    const index = this.discardPile.findIndex((card) => card.id === cardId);
    if (index === -1) return null;
    const [card] = this.discardPile.splice(index, 1);
    return card ?? null;
  }
}
