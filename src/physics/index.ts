export { FiberGeometry, type FiberKind } from './FiberGeometry';
export { CylinderFiber } from './fibers/CylinderFiber';
export { ConeFiber } from './fibers/ConeFiber';
export { RayState } from './RayState';
export { intersectCore, AXIAL_SENTINEL_Z } from './Intersector';
export { reflect, diffuse } from './ReflectionLaw';
export { TrajectorySimulator, traceTrajectory } from './TrajectorySimulator';
export { launchRandomRay, traceRandomBatch, type BatchOptions } from './RayFactory';
export { anglesFromDirection, directionFromAngles, reflectVector, solveQuadratic } from './math_solvers';
export { createSeededRandom } from './utils';
export { FiberConfigurationError, DegenerateIntersectionError } from './errors';
export {
    Termination,
    DEFAULT_TRACE_OPTIONS,
    type AngleRecord,
    type RandomSource,
    type Reflection,
    type TraceOptions,
    type Trajectory
} from './types';

import type { CylinderFiber } from './fibers/CylinderFiber';
import type { ConeFiber } from './fibers/ConeFiber';

/** The closed set of fiber shapes. */
export type Fiber = CylinderFiber | ConeFiber;
