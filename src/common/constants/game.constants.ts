export const GAME_CONFIG = {
  PORT: 8000,
  CORS_ORIGIN: '*',
  QUESTIONS_DIR: './questions',
  QUESTIONS_FILE: './questions/questions-example.json',

  // Player defaults
  INITIAL_MONEY: 500,
  INITIAL_JOKERS: 3,

  // Rewards
  NORMAL_Q_MONEY: 500,
  ESTIMATION_Q_MONEY: 1000,

  // Versus factors applied to the attacked player's money
  VERSUS_WIN_FACTOR: 0.5,
  VERSUS_LOSS_FACTOR: 2.0,

  // Throttling
  THROTTLE_TTL: 60000, // 1 minute in ms
  THROTTLE_LIMIT: 600,

  // Events
  EVENTS: {
    // Client to Server
    GET_GAME_EVENTS: 'get_game_events',
    GET_PLAYER_DATA: 'get_player_data',

    // Server to Client
    CONNECTED: 'connected',
  },
};
