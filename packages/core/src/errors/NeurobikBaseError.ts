/**
 * Base class for every error raised by neurobik.
 * Subclasses decide how they serialize; the CLI only relies on `toJSON()`.
 */
export abstract class NeurobikBaseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    abstract toJSON(): Record<string, unknown>;
}
