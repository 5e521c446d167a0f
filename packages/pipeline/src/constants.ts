export const IMAGE_FILE_REGEX = /\.(jpg|jpeg|png)$/i;
export const QUANTITY_FILE_PREFIXES = ["cards", "quantities"] as const;
export const QUANTITY_FILE_SUFFIX = ".txt";
export const FILENAME_QUANTITY_REGEX = /-x(\d+)/;

export const DEFAULT_OUTPUT_NAME = "cards";
export const PART_SUFFIX = "-part";
export const TEMP_ARTIFACT_SUFFIX = "_temp.png";
export const SCRATCH_DIR_PREFIX = "cardsheet-";

export const ENV_MAX_SIZE_MB = "CARDSHEET_MAX_SIZE_MB";
export const ENV_SCRATCH_DIR = "CARDSHEET_SCRATCH_DIR";
