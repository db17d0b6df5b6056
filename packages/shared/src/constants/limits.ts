export const CONTENT_LIMITS = {
  MAX_PAGE_TITLE_LENGTH: 100,
  MAX_CONTENT_LENGTH: 4096,
  MAX_BUTTON_TEXT_LENGTH: 64,
  MAX_BUTTON_ACTION_LENGTH: 128,
  MAX_WELCOME_MESSAGE_LENGTH: 1000,
  MAX_INPUT_LENGTH: 4096,
} as const;

export const USER_LIMITS = {
  MAX_PAGES_VISITED: 50,
  MAX_BUTTONS_CLICKED: 100,
  USERS_PAGE_SIZE: 10,
  SEARCH_RESULTS_SHOWN: 10,
  SEARCH_RESULT_BUTTONS: 5,
  ACTIVE_USER_WINDOW_DAYS: 7,
} as const;

export const SESSION_DEFAULTS = {
  TIMEOUT_MINUTES: 30,
  SAVE_DEBOUNCE_MS: 3000,
} as const;
