/**
 * RayFactory: launches random rays into a fiber and traces batches of them.
 *
 * Each ray of a seeded batch owns a generator seeded with `seed + index`,
 * so any single ray can be reproduced on its own and batches can be split
 * across workers without changing the result.
 */
import type { FiberGeometry } from './FiberGeometry';
import { RayState } from './RayState';
import { TrajectorySimulator } from './TrajectorySimulator';
import { DegenerateIntersectionError, FiberConfigurationError } from './errors';
import { createSeededRandom } from './utils';
import type { RandomSource, TraceOptions, Trajectory } from './types';

export interface BatchOptions extends Partial<TraceOptions> {
    rays: number;
    maxZenithDegrees?: number;  // Launch cone half-angle, default 30°
    startRadius?: number;       // Launch disk radius [m], default the fiber's core radius
    maxRetries?: number;        // Redraws per ray after a degenerate intersection, default 3
    seed?: number;              // Per-ray seeded generators; otherwise `random` (or Math.random) is shared
}

/**
 * Random ray on the launch face: start point within `startRadius`, zenith
 * within `maxZenithDegrees`.
 */
export function launchRandomRay(startRadius: number, maxZenithDegrees: number, random: RandomSource): RayState {
    const ray = new RayState();
    ray.generateStartPoint(startRadius, random);
    ray.generateAngles(random, maxZenithDegrees);
    return ray;
}

/**
 * Trace `rays` random rays through one fiber, in order.
 *
 * Launch parameters are checked against the fiber before any ray is traced.
 * A ray whose trace hits a degenerate intersection is redrawn from the same
 * generator up to `maxRetries` times; past that the error is rethrown.
 */
export function traceRandomBatch(fiber: FiberGeometry, options: BatchOptions): Trajectory[] {
    const maxZenithDegrees = options.maxZenithDegrees ?? 30;
    const startRadius = options.startRadius ?? fiber.coreRadius;
    const maxRetries = options.maxRetries ?? 3;
    const shared = options.random ?? Math.random;

    if (!(startRadius > 0 && startRadius <= fiber.coreRadius)) {
        throw new FiberConfigurationError(
            `RayFactory: start radius must lie in (0, ${fiber.coreRadius}] for ${fiber.name}, got ${startRadius}`
        );
    }
    if (!(maxZenithDegrees >= 0 && maxZenithDegrees < 90)) {
        throw new FiberConfigurationError(`RayFactory: maximum launch zenith must lie in [0, 90) deg, got ${maxZenithDegrees}`);
    }
    if (!Number.isInteger(options.rays) || options.rays < 0) {
        throw new FiberConfigurationError(`RayFactory: ray count must be a non-negative integer, got ${options.rays}`);
    }

    const trajectories: Trajectory[] = [];
    for (let index = 0; index < options.rays; index++) {
        const random = options.seed === undefined ? shared : createSeededRandom(options.seed + index);
        const simulator = new TrajectorySimulator(fiber, { ...options, random });

        for (let attempt = 0; ; attempt++) {
            const ray = launchRandomRay(startRadius, maxZenithDegrees, random);
            try {
                trajectories.push(simulator.trace(ray));
                break;
            } catch (err) {
                if (!(err instanceof DegenerateIntersectionError) || attempt >= maxRetries) {
                    throw err;
                }
                console.warn(`RayFactory: redrawing ray ${index} after degenerate intersection (attempt ${attempt + 1}).`, err.message);
            }
        }
    }
    return trajectories;
}
