export { DecisionJournal } from './journal';
export type { SignalLogEntry, ExecutionLogEntry, SignalDecision } from './journal';
