/**
 * The generation backend could not produce text (quota, authentication, network).
 */
export class ResponderError extends Error {
    constructor(message: string, readonly provider?: string) {
        super(message);
        this.name = this.constructor.name;
    }
}
