/** Repository whose HEAD commit is reported. */
export const UPSTREAM_URL = 'https://github.com/apache/arrow';

/** History depth of the clone: only the latest commit is fetched. */
export const CLONE_DEPTH = 1;

export const TEMP_DIR_PREFIX = 'upstream-head-';
