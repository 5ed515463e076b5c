import { ElementSet } from '../types';
import { Clue, ClueType, DataInferenceClue } from './Clue';

/**
 * Works out which stolen data values the data-inference clues imply,
 * given the vector of the solved triplet.
 *
 * A clue (V, D) reads "only attacks using V resulted in theft of D". Only clues
 * whose vector is the true vector apply; the data they name are the candidates.
 * A clue naming another vector says nothing about this puzzle's datum, except
 * that a datum it ties to that other vector cannot also be implied here.
 *
 * @returns Candidates in element-list order. Exactly one entry means the datum is uniquely implied;
 * none means the clues do not imply any.
 */
export function inferStolenData(elements: ElementSet, clues: readonly Clue[], trueVector: string): string[] {
    const inferences = clues.filter((c): c is DataInferenceClue => c.type === ClueType.DATA_INFERENCE);

    const implied = new Set(inferences.filter(c => c.vector === trueVector).map(c => c.stolenData));
    const tiedElsewhere = new Set(inferences.filter(c => c.vector !== trueVector).map(c => c.stolenData));

    return elements.stolenData.filter(datum => implied.has(datum) && !tiedElsewhere.has(datum));
}
