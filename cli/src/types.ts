import type { Body, ConservationReport } from '../../src/math/nbody';
import type { TableauName, TableauSpec } from '../../src/math/odesolvers';

export type MethodChoice = TableauName | 'custom';

export interface ScenarioConfig {
  name: string;
  description?: string;
  gravitationalConstant: number;
  bodies: Body[];
  t0: number;
  tf: number;
  h: number;
  method: MethodChoice;
  tableau?: TableauSpec; // Only read when method is "custom"
  sampleEvery: number; // Keep every n-th record when storing and displaying
}

export interface RunObject {
  type: 'run';
  name: string;
  scenarioName: string;
  method: MethodChoice;
  t0: number;
  tf: number;
  h: number;
  sampleEvery: number;
  steps: number;
  elapsedMs: number;
  conservation: ConservationReport;
  data: number[][]; // Sampled [t, ...y] rows
  final: number[]; // Last row, kept even when sampling skips it
  timestamp: string;
}
