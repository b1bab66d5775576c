export * from './conditions.types';
export * from './conditions.service';
export * from './conditions.controller';
export * from './conditions.router';
