export { createGravityModel } from './gravity'
export type { GravityModel, GravityModelOptions } from './gravity'
export {
  centerOfMass,
  conservationReport,
  kineticEnergy,
  potentialEnergy,
  totalEnergy,
  totalMomentum,
} from './invariants'
export type { ConservationReport } from './invariants'
export { AXIS_NAMES, StateLayout } from './layout'
export type { Body, BodyState, Dimension } from './layout'
export { bodyTracks, rowsToTrajectory, sampleTrajectory, trajectoryRows } from './trajectory'
export type { BodyTrack } from './trajectory'
