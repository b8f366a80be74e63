import { isSessionReady } from '@inkling/game';
import {
  CHALLENGES_PER_PLAYER,
  type Challenge,
  type ChallengeDraft,
  type GameSession,
  getTeamPlayers,
  INITIAL_TEAM_SCORE,
  logger,
  PLAYERS_PER_TEAM,
  type Player,
  type TeamColor,
} from '@inkling/shared';

/**
 * Configuration for the in-memory session service.
 */
export interface SessionStoreConfig {
  /** Players allowed per team */
  teamCapacity: number;
  /** Challenges each player submits before drawing starts */
  challengesPerPlayer: number;
  /** Prefix of generated image references */
  imageBasePath: string;
  now: () => number;
}

/**
 * Default configuration.
 */
const DEFAULT_CONFIG: SessionStoreConfig = {
  teamCapacity: PLAYERS_PER_TEAM,
  challengesPerPlayer: CHALLENGES_PER_PLAYER,
  imageBasePath: '/images',
  now: () => Date.now(),
};

/**
 * Error answered to the client with `status` and `message` as body.
 * Membership messages match the production service's texts.
 */
export class StoreError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

interface StoredChallenge {
  challenge: Challenge;
  authorId: string;
  images: number;
}

interface StoredSession {
  session: GameSession;
  challenges: StoredChallenge[];
}

/**
 * In-memory game sessions implementing the remote service's rules.
 *
 * Status progression: lobby → challenge (host starts) → playing/drawing (every
 * player sent their challenges) → playing/guessing (every player drew) →
 * finished (every player guessed).
 */
export class SessionStore {
  private sessions = new Map<string, StoredSession>();
  private readonly config: SessionStoreConfig;
  private challengeCounter = 0;

  constructor(config: Partial<SessionStoreConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Generate a unique session ID.
   */
  generateSessionId(): string {
    // Generate 6 random alphanumeric characters
    const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
    let id = '';
    for (let i = 0; i < 6; i++) {
      id += chars[Math.floor(Math.random() * chars.length)];
    }
    // Ensure uniqueness
    if (this.sessions.has(id)) {
      return this.generateSessionId();
    }
    return id;
  }

  // ============ Sessions ============

  /**
   * Create a session hosted by `hostId`. The host still has to join a team.
   */
  create(hostId: string, id: string = this.generateSessionId()): GameSession {
    const session: GameSession = {
      id,
      status: 'lobby',
      gamePhase: null,
      players: [],
      teamScores: { red: INITIAL_TEAM_SCORE, blue: INITIAL_TEAM_SCORE },
      currentChallengeIndex: 0,
      createdAt: this.config.now(),
      startedAt: null,
      hostId,
    };
    this.sessions.set(id, { session, challenges: [] });
    logger.info('Session created', { sessionId: id, hostId });
    return session;
  }

  get(id: string): GameSession | undefined {
    return this.sessions.get(id)?.session;
  }

  /**
   * Get all sessions (for debugging/admin).
   */
  getAll(): GameSession[] {
    return [...this.sessions.values()].map((stored) => stored.session);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  // ============ Membership ============

  join(id: string, playerId: string, color: TeamColor): GameSession {
    const stored = this.require(id);
    const { session } = stored;
    if (session.players.some((p) => p.id === playerId)) {
      throw new StoreError(400, 'Player already in game session');
    }
    if (session.status !== 'lobby') {
      throw new StoreError(409, 'Game session already started');
    }
    if (getTeamPlayers(session, color).length >= this.config.teamCapacity) {
      throw new StoreError(409, `Team ${color} is full`);
    }

    const player: Player = {
      id: playerId,
      name: playerId,
      color,
      role: null,
      isHost: session.hostId === playerId,
      challengesSent: 0,
      hasDrawn: false,
      hasGuessed: false,
    };
    return this.save(stored, { ...session, players: [...session.players, player] });
  }

  leave(id: string, playerId: string): GameSession {
    const stored = this.require(id);
    const { session } = stored;
    if (!session.players.some((p) => p.id === playerId)) {
      throw new StoreError(400, 'Player not in game session');
    }
    return this.save(stored, {
      ...session,
      players: session.players.filter((p) => p.id !== playerId),
    });
  }

  // ============ Lifecycle ============

  start(id: string, playerId: string): GameSession {
    const stored = this.require(id);
    const { session } = stored;
    if (session.hostId !== playerId) {
      throw new StoreError(403, 'Only the host can start the game session');
    }
    if (session.status !== 'lobby') {
      throw new StoreError(409, 'Game session already started');
    }
    if (!isSessionReady(session)) {
      throw new StoreError(409, 'Both teams need two players');
    }

    // drawer first in each team, guesser second
    const players = session.players.map((player): Player => {
      const team = getTeamPlayers(session, player.color ?? 'red');
      return { ...player, role: team[0]?.id === player.id ? 'drawer' : 'guesser' };
    });
    logger.info('Session started', { sessionId: id });
    return this.save(stored, { ...session, status: 'challenge', players });
  }

  // ============ Challenges ============

  listChallenges(id: string): Challenge[] {
    return this.require(id).challenges.map((stored) => stored.challenge);
  }

  addChallenge(id: string, playerId: string, draft: ChallengeDraft): Challenge {
    const stored = this.require(id);
    const player = this.requirePlayer(stored.session, playerId);
    if (stored.session.status !== 'challenge') {
      throw new StoreError(409, 'Game session is not accepting challenges');
    }
    if (player.challengesSent >= this.config.challengesPerPlayer) {
      throw new StoreError(409, 'All challenges already sent');
    }

    this.challengeCounter++;
    const challenge: Challenge = {
      id: `c${this.challengeCounter}`,
      gameSessionId: id,
      ...draft,
      forbiddenWords: [...draft.forbiddenWords],
      prompt: null,
      imageUrl: null,
      answer: null,
      isResolved: false,
      drawerId: null,
      guesserId: null,
      currentPhase: 'waiting_prompt',
      createdAt: this.config.now(),
      completedAt: null,
    };
    stored.challenges = [...stored.challenges, { challenge, authorId: playerId, images: 0 }];
    this.updatePlayer(stored, playerId, { challengesSent: player.challengesSent + 1 });

    const allSent = stored.session.players.every(
      (p) => p.challengesSent === this.config.challengesPerPlayer
    );
    if (allSent) {
      this.beginDrawing(stored);
    }
    return challenge;
  }

  /**
   * Store the drawer's prompt and return a fresh image reference.
   */
  draw(id: string, challengeId: string, playerId: string, prompt: string): string {
    const stored = this.require(id);
    this.requirePlayer(stored.session, playerId);
    const entry = this.requireChallenge(stored, challengeId);
    if (entry.challenge.drawerId !== playerId) {
      throw new StoreError(403, 'Player is not the drawer of this challenge');
    }

    entry.images++;
    const imageUrl = `${this.config.imageBasePath}/${challengeId}-${entry.images}.png`;
    this.replaceChallenge(stored, { ...entry.challenge, prompt, imageUrl, currentPhase: 'image_generated' });

    const drawn = stored.challenges
      .filter((c) => c.challenge.drawerId === playerId)
      .every((c) => c.challenge.imageUrl !== null);
    if (drawn) {
      this.updatePlayer(stored, playerId, { hasDrawn: true });
    }
    if (stored.session.players.every((p) => p.hasDrawn) && stored.session.gamePhase === 'drawing') {
      this.save(stored, { ...stored.session, gamePhase: 'guessing' });
      logger.info('Session moved to guessing', { sessionId: id });
    }
    return imageUrl;
  }

  answer(id: string, challengeId: string, playerId: string, answer: string, resolved: boolean): Challenge {
    const stored = this.require(id);
    this.requirePlayer(stored.session, playerId);
    const entry = this.requireChallenge(stored, challengeId);
    if (entry.challenge.guesserId !== playerId) {
      throw new StoreError(403, 'Player is not the guesser of this challenge');
    }

    const updated: Challenge = resolved
      ? { ...entry.challenge, answer, isResolved: true, currentPhase: 'resolved', completedAt: this.config.now() }
      : { ...entry.challenge, answer, currentPhase: 'guessing' };
    this.replaceChallenge(stored, updated);

    const guessed = stored.challenges
      .filter((c) => c.challenge.guesserId === playerId)
      .every((c) => c.challenge.isResolved === true);
    if (guessed) {
      this.updatePlayer(stored, playerId, { hasGuessed: true });
    }
    if (stored.session.players.every((p) => p.hasGuessed)) {
      this.save(stored, { ...stored.session, status: 'finished', gamePhase: null });
      logger.info('Session finished', { sessionId: id });
    }
    return updated;
  }

  // ============ Internals ============

  /**
   * Assign each challenge to the opposing team: the author's counterpart
   * (same join position) draws it and their teammate guesses it.
   */
  private beginDrawing(stored: StoredSession): void {
    const { session } = stored;
    const teams: Record<TeamColor, Player[]> = {
      red: getTeamPlayers(session, 'red'),
      blue: getTeamPlayers(session, 'blue'),
    };

    stored.challenges = stored.challenges.map((entry) => {
      const author = session.players.find((p) => p.id === entry.authorId);
      const ownTeam = author?.color ?? 'red';
      const opponents = teams[ownTeam === 'red' ? 'blue' : 'red'];
      const position = Math.max(0, teams[ownTeam].findIndex((p) => p.id === entry.authorId));
      const drawer = opponents[position];
      const guesser = opponents[1 - position];
      return {
        ...entry,
        challenge: { ...entry.challenge, drawerId: drawer?.id ?? null, guesserId: guesser?.id ?? null },
      };
    });

    this.save(stored, {
      ...session,
      status: 'playing',
      gamePhase: 'drawing',
      startedAt: this.config.now(),
    });
    logger.info('Session moved to drawing', { sessionId: session.id });
  }

  private require(id: string): StoredSession {
    const stored = this.sessions.get(id);
    if (!stored) {
      throw new StoreError(404, 'Game session not found');
    }
    return stored;
  }

  private requirePlayer(session: GameSession, playerId: string): Player {
    const player = session.players.find((p) => p.id === playerId);
    if (!player) {
      throw new StoreError(400, 'Player not in game session');
    }
    return player;
  }

  private requireChallenge(stored: StoredSession, challengeId: string): StoredChallenge {
    const entry = stored.challenges.find((c) => c.challenge.id === challengeId);
    if (!entry) {
      throw new StoreError(404, 'Challenge not found');
    }
    return entry;
  }

  private replaceChallenge(stored: StoredSession, challenge: Challenge): void {
    stored.challenges = stored.challenges.map((entry) =>
      entry.challenge.id === challenge.id ? { ...entry, challenge } : entry
    );
  }

  private updatePlayer(stored: StoredSession, playerId: string, patch: Partial<Omit<Player, 'id'>>): void {
    this.save(stored, {
      ...stored.session,
      players: stored.session.players.map((p) => (p.id === playerId ? { ...p, ...patch } : p)),
    });
  }

  private save(stored: StoredSession, session: GameSession): GameSession {
    stored.session = session;
    return session;
  }
}
