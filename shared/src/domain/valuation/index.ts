export * from './costModel.js';
export * from './aggregator.js';
export * from './shipping.js';
