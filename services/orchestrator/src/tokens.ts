export const APP_CONFIG = Symbol("APP_CONFIG");
export const CASE_REPOSITORY = Symbol("CASE_REPOSITORY");
export const CRITIQUE_HISTORY = Symbol("CRITIQUE_HISTORY");
export const VISION_CLIENTS = Symbol("VISION_CLIENTS");
export const OPINION_PROVIDERS = Symbol("OPINION_PROVIDERS");
