import { Vector3 } from 'three';
import type { RayState } from './RayState';
import { solveQuadratic } from './math_solvers';
import { DegenerateIntersectionError } from './errors';

/** z reported for a ray parallel to the axis, which never meets the wall. */
export const AXIAL_SENTINEL_Z = -1;

/**
 * Forward exit point of the ray's line through the cylinder of radius
 * `coreRadius` about the Z axis.
 *
 * The cross-section is solved as a circle-line problem in the transverse
 * plane, parametrised by transverse travel t:
 *   |(x0, y0) + t (cos φ, sin φ)|² = R²  →  t² + 2γt + (x0² + y0² - R²) = 0
 * with γ = x0 cos φ + y0 sin φ. The larger root is the forward wall; the
 * axial advance is t · cot(zenith).
 */
export function intersectCore(ray: RayState, coreRadius: number): Vector3 {
    const { x: x0, y: y0, z: z0 } = ray.position;
    if (ray.zenith === 0) {
        return new Vector3(x0, y0, AXIAL_SENTINEL_Z);
    }

    const cosPhi = Math.cos(ray.azimuth);
    const sinPhi = Math.sin(ray.azimuth);
    const gamma = cosPhi * x0 + sinPhi * y0;
    const C = x0 * x0 + y0 * y0 - coreRadius * coreRadius;

    const roots = solveQuadratic(1, 2 * gamma, C);
    if (roots.length === 0) {
        throw new DegenerateIntersectionError(ray.position, ray.azimuth, ray.zenith, gamma * gamma - C);
    }

    const t = roots[roots.length - 1];
    const cot = Math.cos(ray.zenith) / Math.sin(ray.zenith);
    return new Vector3(x0 + cosPhi * t, y0 + sinPhi * t, z0 + cot * t);
}
