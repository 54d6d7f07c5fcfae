export class InvalidParameterError extends Error {
    readonly name = 'InvalidParameterError';

    constructor(public readonly parameter: string, public readonly value: unknown, message: string) {
        super(message);
    }
}
