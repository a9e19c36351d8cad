export const APP_NAME = "transcript-recall";
export const APP_VERSION = "0.1.0";
