/**
 * Calibration module re-exports
 */

export {
    // Types
    type CalibrationEngineParams,
    type CalibrationStatus,
    // Engine
    CalibrationEngine,
    createInitialCalibrationState,
    nextDisplayMode,
} from './calibrationEngine';

export { LiveSmoother } from './liveSmoother';

export {
    // Types
    type ReductionFloors,
    type ReductionReferences,
    type ReductionResult,
    // Functions
    computeBeerLambert,
    computeLogReflectance,
    computeReflectance,
    computeTransmittance,
    reduceVector,
} from './reductions';
