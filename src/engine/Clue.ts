/**
 * Enumeration of all supported clue types.
 * The string values are the names used in puzzle files.
 */
export enum ClueType {
    /** An actor did not use a vector. */
    NEGATION = 'negation',
    /** A vector was used against an asset. */
    AFFIRMATIVE = 'affirmative',
    /** Whoever used a vector did not access an asset. */
    RELATIONAL = 'relational',
    /** If an actor used a vector, they accessed an asset. */
    CONDITIONAL = 'conditional',
    /** A datum was stolen only in attacks using a vector. */
    DATA_INFERENCE = 'data-inference',
}

/**
 * Example: "GhostShell did not use SQL Injection."
 */
export interface NegationClue {
    type: ClueType.NEGATION;
    actor: string;
    vector: string;
}

/**
 * Example: "Phishing was used against the Email Server."
 */
export interface AffirmativeClue {
    type: ClueType.AFFIRMATIVE;
    vector: string;
    asset: string;
}

/**
 * Example: "The actor that used SQL Injection did not access the HR Portal."
 */
export interface RelationalClue {
    type: ClueType.RELATIONAL;
    vector: string;
    asset: string;
}

/**
 * Example: "If ZeroShadow used RDP Exploit, then they accessed the Finance Database."
 */
export interface ConditionalClue {
    type: ClueType.CONDITIONAL;
    actor: string;
    vector: string;
    asset: string;
}

/**
 * Example: "Only attacks using Phishing resulted in theft of Source Code."
 *
 * Unlike the other kinds, this clue says nothing about the triplet itself.
 * It ties the stolen datum to the vector and is checked once the triplet is known.
 */
export interface DataInferenceClue {
    type: ClueType.DATA_INFERENCE;
    vector: string;
    stolenData: string;
}

export type Clue = NegationClue | AffirmativeClue | RelationalClue | ConditionalClue | DataInferenceClue;

/**
 * Renders a clue as the sentence shown to players.
 */
export function describeClue(clue: Clue): string {
    switch (clue.type) {
        case ClueType.NEGATION:
            return `${clue.actor} did not use ${clue.vector}.`;
        case ClueType.AFFIRMATIVE:
            return `${clue.vector} was used against the ${clue.asset}.`;
        case ClueType.RELATIONAL:
            return `The actor that used ${clue.vector} did not access the ${clue.asset}.`;
        case ClueType.CONDITIONAL:
            return `If ${clue.actor} used ${clue.vector}, then they accessed the ${clue.asset}.`;
        case ClueType.DATA_INFERENCE:
            return `Only attacks using ${clue.vector} resulted in theft of ${clue.stolenData}.`;
    }
}
