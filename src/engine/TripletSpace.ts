import { ElementSet, Triplet } from '../types';
import { MalformedPuzzleError } from '../errors';
import { MAX_ELEMENTS, MIN_ELEMENTS } from '../defaults';

/**
 * The space of every (actor, vector, asset) combination for an element set.
 *
 * Each triplet gets one boolean indicator variable, numbered from 1 in
 * actor-major order, then vector, then asset. Variable numbers follow the
 * DIMACS convention so they can be negated to form literals.
 */
export class TripletSpace {
    public readonly elements: ElementSet;

    private actorIndex: Map<string, number>;
    private vectorIndex: Map<string, number>;
    private assetIndex: Map<string, number>;
    private stolenDataSet: Set<string>;

    /**
     * Creates a new TripletSpace instance.
     *
     * @param elements - The four element lists of the puzzle.
     * @throws {MalformedPuzzleError} If a list has the wrong number of entries or contains duplicates.
     */
    constructor(elements: ElementSet) {
        this.validateElements(elements);
        this.elements = elements;
        this.actorIndex = indexOf(elements.actors);
        this.vectorIndex = indexOf(elements.vectors);
        this.assetIndex = indexOf(elements.assets);
        this.stolenDataSet = new Set(elements.stolenData);
    }

    private validateElements(elements: ElementSet): void {
        const lists: [string, readonly string[]][] = [
            ['actors', elements.actors],
            ['vectors', elements.vectors],
            ['assets', elements.assets],
            ['stolenData', elements.stolenData],
        ];

        for (const [name, values] of lists) {
            if (values.length < MIN_ELEMENTS || values.length > MAX_ELEMENTS) {
                throw new MalformedPuzzleError(`List '${name}' has ${values.length} entries, expected ${MIN_ELEMENTS}-${MAX_ELEMENTS}.`);
            }

            const seen = new Set<string>();
            for (const value of values) {
                if (seen.has(value)) {
                    throw new MalformedPuzzleError(`List '${name}' contains '${value}' more than once.`);
                }
                seen.add(value);
            }
        }
    }

    /** Number of triplets, which is also the number of indicator variables. */
    public get size(): number {
        return this.elements.actors.length * this.elements.vectors.length * this.elements.assets.length;
    }

    public hasActor(actor: string): boolean {
        return this.actorIndex.has(actor);
    }

    public hasVector(vector: string): boolean {
        return this.vectorIndex.has(vector);
    }

    public hasAsset(asset: string): boolean {
        return this.assetIndex.has(asset);
    }

    public hasStolenData(stolenData: string): boolean {
        return this.stolenDataSet.has(stolenData);
    }

    /**
     * Gets the indicator variable of a triplet.
     *
     * @throws {MalformedPuzzleError} If any component is not part of the element set.
     */
    public variableOf(actor: string, vector: string, asset: string): number {
        const a = this.actorIndex.get(actor);
        const v = this.vectorIndex.get(vector);
        const s = this.assetIndex.get(asset);
        if (a === undefined || v === undefined || s === undefined) {
            throw new MalformedPuzzleError(`Triplet (${actor}, ${vector}, ${asset}) is not part of the puzzle.`);
        }

        const vectorCount = this.elements.vectors.length;
        const assetCount = this.elements.assets.length;
        return (a * vectorCount + v) * assetCount + s + 1;
    }

    /**
     * Gets the triplet an indicator variable stands for.
     *
     * @throws {RangeError} If the variable is outside 1..size.
     */
    public tripletOf(variable: number): Triplet {
        if (!Number.isInteger(variable) || variable < 1 || variable > this.size) {
            throw new RangeError(`Variable ${variable} is outside 1..${this.size}.`);
        }

        const assetCount = this.elements.assets.length;
        const vectorCount = this.elements.vectors.length;
        const index = variable - 1;
        const s = index % assetCount;
        const v = Math.floor(index / assetCount) % vectorCount;
        const a = Math.floor(index / (assetCount * vectorCount));

        return {
            actor: this.elements.actors[a],
            vector: this.elements.vectors[v],
            asset: this.elements.assets[s],
        };
    }

    /** Every indicator variable, in ascending order. */
    public variables(): number[] {
        return Array.from({ length: this.size }, (_, i) => i + 1);
    }
}

function indexOf(values: readonly string[]): Map<string, number> {
    return new Map(values.map((v, i): [string, number] => [v, i]));
}
