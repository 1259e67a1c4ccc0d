import type { Vector3 } from 'three';
import type { RayState } from './RayState';
import type { RandomSource, Reflection } from './types';
import { anglesFromDirection, directionFromAngles, reflectVector } from './math_solvers';

/**
 * Specular reflection of the ray's direction off a wall with inward unit
 * normal `normal`. `incidence` is the signed cosine v·n, negative for a
 * ray heading into the wall.
 */
export function reflect(ray: RayState, normal: Vector3): Reflection {
    const incidence = ray.direction.dot(normal);
    const direction = reflectVector(ray.direction, normal);
    const { azimuth, zenith } = anglesFromDirection(direction);
    return { azimuth, zenith, incidence, direction };
}

/**
 * Rough-wall scattering: azimuth and zenith each receive an independent
 * uniform offset in [-diffusion, +diffusion]. The incidence cosine is kept;
 * the direction follows the new angles.
 */
export function diffuse(reflection: Reflection, diffusion: number, random: RandomSource): Reflection {
    const azimuth = reflection.azimuth + (random() - 0.5) * 2 * diffusion;
    const zenith = reflection.zenith + (random() - 0.5) * 2 * diffusion;
    return {
        azimuth,
        zenith,
        incidence: reflection.incidence,
        direction: directionFromAngles(azimuth, zenith)
    };
}
