/** Thrown when one or more output effects of a checkout fail. */
export class EffectsError extends Error {
    readonly errors: Error[];

    constructor(errors: Error[]) {
        super(errors.map(e => e.message).join('; '));
        this.name = 'EffectsError';
        this.errors = errors;
    }
}
