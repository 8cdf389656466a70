export type InvalidInputCode =
    | 'bin-width'
    | 'empty'
    | 'zero-weight'
    | 'entry'
    | 'duplicate-label'
    | 'label-spacing'
    | 'empty-range'
    | 'overflow';

/**
 * Raised when a sampler cannot be built from the supplied bins.
 * Never raised while sampling.
 */
export class InvalidInputError extends Error {
    readonly code: InvalidInputCode;

    constructor(code: InvalidInputCode, message: string) {
        super(message);
        this.name = 'InvalidInputError';
        this.code = code;
    }
}
