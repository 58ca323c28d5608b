/**
 * Error taxonomy for the metabolism core.
 *
 * Store errors (unknown, insufficient, out-of-bounds) are raised by
 * MetaboliteStore; Reaction wraps them in ReactionError; pathways wrap a
 * ReactionError in their own PathwayError subclass.
 */

export class MetaboliteError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MetaboliteError';
    }
}

export class UnknownMetaboliteError extends MetaboliteError {
    readonly metabolite: string;

    constructor(metabolite: string) {
        super(`Unknown metabolite: ${metabolite}`);
        this.name = 'UnknownMetaboliteError';
        this.metabolite = metabolite;
    }
}

export class InsufficientMetaboliteError extends MetaboliteError {
    readonly metabolite: string;
    readonly requested: number;
    readonly available: number;

    constructor(metabolite: string, requested: number, available: number) {
        super(`Insufficient ${metabolite}: requested ${requested}, available ${available}`);
        this.name = 'InsufficientMetaboliteError';
        this.metabolite = metabolite;
        this.requested = requested;
        this.available = available;
    }
}

export class QuantityError extends MetaboliteError {
    readonly metabolite: string;
    readonly attempted: number;

    constructor(metabolite: string, attempted: number, min: number, max: number) {
        super(
            attempted < min
                ? `Cannot reduce ${metabolite} below ${min}. Attempted to set ${metabolite} to ${attempted}.`
                : `Cannot exceed max quantity for ${metabolite}. Attempted to set ${metabolite} to ${attempted}, but max is ${max}.`,
        );
        this.name = 'QuantityError';
        this.metabolite = metabolite;
        this.attempted = attempted;
    }
}

export class MetaboliteLockError extends MetaboliteError {
    constructor(metabolite: string) {
        super(`Metabolite ${metabolite} is already being updated`);
        this.name = 'MetaboliteLockError';
    }
}

export class ReactionError extends Error {
    readonly reaction: string;

    constructor(reaction: string, message: string, options?: { cause?: unknown }) {
        super(`Reaction '${reaction}' failed: ${message}`, options);
        this.name = 'ReactionError';
        this.reaction = reaction;
    }
}

export type PathwayName = 'glycolysis' | 'krebs_cycle' | 'pyruvate_oxidation' | 'oxidative_phosphorylation';

export class PathwayError extends Error {
    readonly pathway: PathwayName;

    constructor(pathway: PathwayName, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PathwayError';
        this.pathway = pathway;
    }
}

export class GlycolysisError extends PathwayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('glycolysis', message, options);
        this.name = 'GlycolysisError';
    }
}

export class KrebsCycleError extends PathwayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('krebs_cycle', message, options);
        this.name = 'KrebsCycleError';
    }
}

export class PyruvateOxidationError extends PathwayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('pyruvate_oxidation', message, options);
        this.name = 'PyruvateOxidationError';
    }
}

export class OxidativePhosphorylationError extends PathwayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('oxidative_phosphorylation', message, options);
        this.name = 'OxidativePhosphorylationError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
