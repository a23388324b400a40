export const CLI_NAME = "dirmirror";

export const ENV_CONCURRENCY = "DIRMIRROR_CONCURRENCY";
export const ENV_HASH = "DIRMIRROR_HASH";
export const ENV_DISABLE_LOG_ECHO = "DIRMIRROR_DISABLE_LOG_ECHO";
