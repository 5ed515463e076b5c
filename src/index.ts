export * from './types';
export * from './engine/Clue';
export * from './engine/TripletSpace';
export * from './engine/PuzzleChecker';
export * from './engine/ConstraintEncoder';
export * from './engine/SolverSession';
export * from './engine/LogicSolverSession';
export * from './engine/UniquenessProver';
export * from './engine/DataInference';
export * from './engine/Explainer';
export * from './engine/Validator';
export * from './records';
export * from './defaults';
export * from './errors';
