export interface FieldIssue {
    field: string;
    message: string;
}

/**
 * Raised when an application record is missing a required field or carries a value
 * outside the field's declared range. Lists every offending field of the record.
 */
export class ValidationError extends Error {
    public readonly fields: string[];
    public readonly issues: FieldIssue[];

    constructor(issues: FieldIssue[]) {
        const fields = [...new Set(issues.map(i => i.field))];
        super(`Invalid application fields: ${fields.join(', ')}`);
        this.name = 'ValidationError';
        this.fields = fields;
        this.issues = issues;
    }
}

/**
 * Raised while building the decision context: unreadable artifacts, schema failures, bad tuning values.
 */
export class ConfigurationError extends Error {
    constructor(message: string, public readonly details: string[] = []) {
        super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
        this.name = 'ConfigurationError';
    }
}
