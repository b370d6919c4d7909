export const INITHOME_CONFIG_ENV = "INITHOME_CONFIG";
export const INITHOME_HOME_ENV = "INITHOME_HOME";
export const INITHOME_SUBDIRECTORY_ENV = "INITHOME_SUBDIRECTORY";
export const INITHOME_UID_ENV = "INITHOME_UID";
export const INITHOME_GID_ENV = "INITHOME_GID";
export const INITHOME_MODE_ENV = "INITHOME_MODE";
export const INITHOME_FOREIGN_HOME_ENV = "INITHOME_FOREIGN_HOME";

/**
 * Largest UID or GID accepted. Linux does not support ids above this and 2^32 - 1 is the
 * "no id" sentinel for chown.
 */
export const INITHOME_MAX_ID = 2 ** 32 - 2;

export const INITHOME_DEFAULT_MODE = 0o700;
export const INITHOME_MODE_MASK = 0o7777;

export const INITHOME_EXIT_SUCCESS = 0;
export const INITHOME_EXIT_UNEXPECTED = 1;
export const INITHOME_EXIT_CONFIGURATION = 2;
export const INITHOME_EXIT_PATH_CONFLICT = 3;
export const INITHOME_EXIT_PERMISSION = 4;
export const INITHOME_EXIT_VERIFICATION = 5;
