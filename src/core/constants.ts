/** Listener failure policies accepted by the `listenerErrors` option. */
export const LISTENER_ERROR_POLICIES = ["propagate", "log"] as const;

/** Environment variable consulted when `listenerErrors` is not given. */
export const LISTENER_ERRORS_ENV_VAR = "CATEGORY_TREE_LISTENER_ERRORS";
