export enum GamePhase {
  BUILDING = 'building',
  DEFENSE = 'defense'
}

export enum GameStatus {
  NOT_STARTED = 'not-started',
  PLAYING = 'playing',
  GAME_OVER = 'game-over'
}

/** How a spawned unit left the field. `SKIPPED` marks a unit that could not be instantiated. */
export enum UnitResolution {
  ARRIVED = 'arrived',
  KILLED = 'killed',
  SKIPPED = 'skipped'
}
