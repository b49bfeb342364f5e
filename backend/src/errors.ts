/** Rejected caller input: bad alphabet, too short, malformed request. */
export class AnalysisInputError extends Error {
    public readonly statusCode = 400;

    constructor(message: string) {
        super(message);
        this.name = 'AnalysisInputError';
    }
}

export class ProteinNotFoundError extends Error {
    public readonly statusCode = 404;

    constructor(public readonly proteinId: string) {
        super(`Protein ${proteinId} not found or not secreted`);
        this.name = 'ProteinNotFoundError';
    }
}
