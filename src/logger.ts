import debug from "debug";

const ROOT = "toon-convert";

/** Namespaced diagnostic logger; enable with `DEBUG=toon-convert:*`. */
export const createLogger = (scope: string) => debug(`${ROOT}:${scope}`);
