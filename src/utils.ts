/**
 * Returns a copy of `base` with `suffix` appended to its path. A bare "/" path
 * counts as empty, since the URL parser reports an empty path that way.
 */
export function appendPath(base: URL, suffix: string): string {
    const url = new URL(base.toString());
    url.pathname = (url.pathname === "/" ? "" : url.pathname) + suffix;
    return url.toString();
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
