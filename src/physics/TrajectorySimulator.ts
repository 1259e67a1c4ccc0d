import { MathUtils, Vector3 } from 'three';
import type { FiberGeometry } from './FiberGeometry';
import type { RayState } from './RayState';
import { DEFAULT_TRACE_OPTIONS, Termination, type AngleRecord, type RandomSource, type TraceOptions, type Trajectory } from './types';
import { intersectCore } from './Intersector';
import { diffuse, reflect } from './ReflectionLaw';
import { FiberConfigurationError } from './errors';

function angleRecord(azimuth: number, zenith: number, incidence: number): AngleRecord {
    return {
        azimuth: MathUtils.radToDeg(azimuth),
        zenith: MathUtils.radToDeg(zenith),
        incidence: MathUtils.radToDeg(incidence)
    };
}

/**
 * Bounces a single ray down a fiber until it leaves the far end, escapes
 * through the wall, or runs out of reflections.
 *
 * The fiber is only read and the caller's ray is copied before stepping,
 * so one simulator (or one fiber) can serve any number of rays.
 */
export class TrajectorySimulator {
    maxReflections: number = DEFAULT_TRACE_OPTIONS.maxReflections;
    angleElimination: boolean = DEFAULT_TRACE_OPTIONS.angleElimination;
    verbose: boolean = DEFAULT_TRACE_OPTIONS.verbose;
    random: RandomSource = DEFAULT_TRACE_OPTIONS.random;
    fiber: FiberGeometry;

    constructor(fiber: FiberGeometry, options: Partial<TraceOptions> = {}) {
        this.fiber = fiber;
        this.maxReflections = options.maxReflections ?? this.maxReflections;
        this.angleElimination = options.angleElimination ?? this.angleElimination;
        this.verbose = options.verbose ?? this.verbose;
        this.random = options.random ?? this.random;
    }

    trace(start: RayState): Trajectory {
        const maxReflections = this.maxReflections;
        if (!Number.isInteger(maxReflections) || maxReflections < 1) {
            throw new FiberConfigurationError(`maxReflections must be a positive integer, got ${maxReflections}`);
        }

        const fiber = this.fiber;
        const zMax = fiber.zMax;
        const criticalAngle = fiber.criticalAngle();

        const ray = start.clone();
        const points: Vector3[] = Array.from({ length: maxReflections }, () => new Vector3());
        const angles: AngleRecord[] = Array.from({ length: maxReflections }, () => angleRecord(0, 0, 0));

        points[0].copy(ray.position);
        angles[0] = angleRecord(ray.azimuth, ray.zenith, 0);

        // Incidence reported for the exit point; before the first bounce this is the launch zenith.
        let lastIncidence = ray.zenith;

        for (let i = 1; i < maxReflections; i++) {
            const hit = intersectCore(ray, fiber.coreRadius);

            // 1. Far end (an axial ray goes straight there)
            if (ray.zenith === 0 || hit.z > zMax) {
                const overshoot = (hit.z - zMax) / ray.direction.z;
                points[i] = hit.sub(ray.direction.clone().multiplyScalar(overshoot));
                angles[i] = angleRecord(ray.azimuth, ray.zenith, Math.abs(lastIncidence));
                if (this.verbose) {
                    console.log(`TrajectorySimulator: ray reached z_max = ${zMax} after ${i - 1} reflections.`);
                }
                return this.finish(points, angles, i + 1, Termination.ReachedMaxLength);
            }

            // 2. Wall reflection
            const normal = fiber.normalAt(hit);
            let reflection = reflect(ray, normal);
            if (fiber.diffusion) {
                reflection = diffuse(reflection, fiber.diffusion, this.random);
            }

            points[i] = hit;
            angles[i] = angleRecord(reflection.azimuth, reflection.zenith, Math.abs(reflection.incidence));
            lastIncidence = reflection.incidence;

            // 3. Leak into the cladding
            const grazing = Math.PI / 2 - Math.abs(reflection.incidence);
            if (this.angleElimination && grazing < criticalAngle) {
                if (this.verbose) {
                    console.log(
                        `TrajectorySimulator: ray terminated at reflection ${i}, critical angle ` +
                        `${MathUtils.radToDeg(criticalAngle).toFixed(3)} deg, reflection angle ` +
                        `${MathUtils.radToDeg(grazing).toFixed(3)} deg.`
                    );
                }
                return this.finish(points, angles, i + 1, Termination.ExceededCriticalAngle);
            }

            ray.setValues(reflection.azimuth, reflection.zenith, hit);
        }

        if (this.verbose) {
            console.log(`TrajectorySimulator: reflections exceeded ${maxReflections}.`);
        }
        return this.finish(points, angles, maxReflections, Termination.ExceededReflectionBudget);
    }

    private finish(points: Vector3[], angles: AngleRecord[], count: number, termination: Termination): Trajectory {
        return { geometryId: this.fiber.id, points, angles, count, termination };
    }
}

/**
 * One-shot trace with the given options merged over the defaults.
 */
export function traceTrajectory(fiber: FiberGeometry, start: RayState, options: Partial<TraceOptions> = {}): Trajectory {
    return new TrajectorySimulator(fiber, options).trace(start);
}
