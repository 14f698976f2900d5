// ─── Turn / Phase Orchestrator ─────────────────────────────────────
// MOVEMENT → ACTION → END per player, then on to the next living
// seat. Transitions are caller-driven; nothing here is time-based.

import type { Player, PlayerId, TurnPhase } from "../types/index.js";
import type { EngineContext } from "./context.js";
import { EngineErrorCode } from "./errors.js";
import { currentPlayer, freshTurnFlags, livingPlayers } from "./player.js";

/** The result of one advance. */
export type PhaseTransition =
  | { readonly kind: "phase"; readonly from: TurnPhase; readonly to: TurnPhase }
  | {
      readonly kind: "next_turn";
      readonly playerId: PlayerId;
      readonly turnNumber: number;
      /** The same player goes again (Multiplication). */
      readonly extraTurn: boolean;
    }
  | { readonly kind: "halted"; readonly reason: string }
  | { readonly kind: "ignored"; readonly reason: string };

const NEXT_PHASE: Readonly<Record<Exclude<TurnPhase, "end">, TurnPhase>> = {
  movement: "action",
  action: "end",
};

export class TurnOrchestrator {
  constructor(private readonly ctx: EngineContext) {}

  /** Starts the game on the first living seat. */
  startFirstTurn(): PhaseTransition {
    const session = this.ctx.session;
    const index = session.players.findIndex((player) => player.alive);
    const first = session.players[index];
    if (!first) return this.halt("No living player to start the game");

    session.currentPlayerIndex = index;
    session.phase = "movement";
    this.startTurn(first);
    return { kind: "next_turn", playerId: first.id, turnNumber: session.turnNumber, extraTurn: false };
  }

  /**
   * Moves one step along MOVEMENT → ACTION → END → next player.
   * With no living player left the session is halted instead.
   */
  advancePhase(): PhaseTransition {
    const session = this.ctx.session;
    if (session.status.kind !== "in_progress") {
      return { kind: "ignored", reason: `Game is ${session.status.kind}` };
    }
    if (session.phase === "end") {
      return this.nextTurn();
    }
    return this.changePhase(NEXT_PHASE[session.phase]);
  }

  /** Passes the rest of the turn: straight to END, then onward. */
  endTurn(): PhaseTransition {
    const session = this.ctx.session;
    if (session.status.kind !== "in_progress") {
      return { kind: "ignored", reason: `Game is ${session.status.kind}` };
    }
    if (session.phase !== "end") {
      this.changePhase("end");
    }
    return this.nextTurn();
  }

  private changePhase(to: TurnPhase): PhaseTransition {
    const session = this.ctx.session;
    const from = session.phase;
    session.phase = to;
    const player = currentPlayer(session);
    if (player) {
      this.ctx.events.emit("phase-changed", { playerId: player.id, from, to });
    }
    return { kind: "phase", from, to };
  }

  private nextTurn(): PhaseTransition {
    const session = this.ctx.session;

    const current = currentPlayer(session);
    if (current?.alive && current.flags.extraTurns > 0) {
      current.flags.extraTurns -= 1;
      this.changePhase("movement");
      this.startTurn(current);
      return { kind: "next_turn", playerId: current.id, turnNumber: session.turnNumber, extraTurn: true };
    }

    if (livingPlayers(session).length === 0) {
      return this.halt("Every player is dead; no turn can start");
    }

    const count = session.players.length;
    for (let step = 1; step <= count; step++) {
      const index = (session.currentPlayerIndex + step) % count;
      if (index === 0) {
        session.turnNumber += 1;
      }
      const next = session.players[index];
      if (!next?.alive) continue;

      session.currentPlayerIndex = index;
      this.changePhase("movement");
      this.startTurn(next);
      return { kind: "next_turn", playerId: next.id, turnNumber: session.turnNumber, extraTurn: false };
    }

    // Unreachable while a living player exists.
    return this.halt("No living seat found");
  }

  private startTurn(player: Player): void {
    player.turn = freshTurnFlags();
    player.flags.shielded = false;
    player.flags.damageImmune = false;
    this.ctx.logger.debug(`Turn ${this.ctx.session.turnNumber}: ${player.name}`);
    this.ctx.events.emit("turn-started", {
      playerId: player.id,
      turnNumber: this.ctx.session.turnNumber,
      isBot: player.isBot,
    });
  }

  private halt(reason: string): PhaseTransition {
    this.ctx.session.status = { kind: "halted", reason };
    this.ctx.logger.error(reason, {
      code: EngineErrorCode.LIVENESS_HAZARD,
      turnNumber: this.ctx.session.turnNumber,
    });
    return { kind: "halted", reason };
  }
}
