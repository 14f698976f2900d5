// ─── State Filter ──────────────────────────────────────────────────
// Read-only projections of the session. The roster snapshot is the
// full truth (for the win evaluator, renderers, persistence); the
// player view hides secret identities the viewer has not seen.

import type {
  ActionKind,
  Faction,
  GameSession,
  GameStatus,
  PlayerId,
  TurnPhase,
} from "../types/index.js";
import type { DeckLookup } from "../deck/catalog.js";
import { getLegalActions } from "./action-validator.js";
import { currentPlayer, findPlayer } from "./player.js";

export interface RosterEntry {
  readonly id: PlayerId;
  readonly name: string;
  readonly isBot: boolean;
  readonly faction: Faction;
  readonly characterId: string;
  readonly hp: number;
  readonly hpMax: number;
  readonly alive: boolean;
  readonly revealed: boolean;
  readonly equipment: readonly string[];
  readonly position: string | null;
}

/** A roster entry as another player sees it. */
export type VisibleRosterEntry = Omit<RosterEntry, "faction" | "characterId" | "hpMax"> & {
  readonly faction: Faction | null;
  readonly characterId: string | null;
  readonly hpMax: number | null;
};

export interface PlayerView {
  readonly sessionId: string;
  readonly status: GameStatus;
  readonly phase: TurnPhase;
  readonly turnNumber: number;
  readonly currentPlayerId: PlayerId | null;
  readonly myPlayerId: PlayerId;
  readonly isMyTurn: boolean;
  readonly players: readonly VisibleRosterEntry[];
  /** The viewer's own hand, by card name. */
  readonly hand: readonly string[];
  /** Enabled action kinds for the viewer. */
  readonly validActions: readonly ActionKind[];
}

/** The full roster, identities included. */
export function createRosterSnapshot(session: GameSession): readonly RosterEntry[] {
  return session.players.map((player) => ({
    id: player.id,
    name: player.name,
    isBot: player.isBot,
    faction: player.faction,
    characterId: player.characterId,
    hp: player.hp,
    hpMax: player.hpMax,
    alive: player.alive,
    revealed: player.revealed,
    equipment: player.equipment.map((card) => card.name),
    position: player.position,
  }));
}

/**
 * Creates a player-specific view. Faction, character and max hp of
 * unrevealed players other than the viewer are replaced with null.
 *
 * @throws {Error} if the viewer is not seated.
 */
export function createPlayerView(
  session: GameSession,
  viewerId: PlayerId,
  deckLookup?: DeckLookup
): PlayerView {
  const viewer = findPlayer(session, viewerId);
  if (!viewer) {
    throw new Error(`Player not found: ${viewerId}`);
  }

  const players = createRosterSnapshot(session).map((entry): VisibleRosterEntry => {
    if (entry.revealed || entry.id === viewerId) return entry;
    return { ...entry, faction: null, characterId: null, hpMax: null };
  });

  const current = currentPlayer(session);
  return {
    sessionId: session.id,
    status: session.status,
    phase: session.phase,
    turnNumber: session.turnNumber,
    currentPlayerId: current?.id ?? null,
    myPlayerId: viewerId,
    isMyTurn: current?.id === viewerId,
    players,
    hand: viewer.hand.map((card) => card.name),
    validActions: getLegalActions(session, viewerId, deckLookup)
      .filter((action) => action.enabled)
      .map((action) => action.kind),
  };
}
