export * from './aggregators';
export * from './merge';
