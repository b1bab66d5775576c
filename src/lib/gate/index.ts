export * from './gate.types';
export * from './gate.predictor';
export * from './gate.state';
