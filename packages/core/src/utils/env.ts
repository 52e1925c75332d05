const ENV_REFERENCE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Expand `$VAR` and `${VAR}` references from the environment.
 * References to unset variables are left untouched.
 */
export function expandEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
    return value.replace(ENV_REFERENCE, (match, braced: string | undefined, bare: string | undefined) => {
        const name = braced ?? bare;
        if (name === undefined) return match;
        const resolved = env[name];
        return resolved === undefined ? match : resolved;
    });
}
