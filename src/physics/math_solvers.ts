import { MathUtils, Vector3 } from 'three';
import { transverseRadius } from './lightSpace';

/**
 * Calculates the mirror reflection R = I - 2(N.I)N.
 * N must be unit length; |R| == |I|.
 */
export function reflectVector(incident: Vector3, normal: Vector3): Vector3 {
    return incident.clone().sub(
        normal.clone().multiplyScalar(2 * incident.dot(normal))
    );
}

/**
 * Solves Quadratic Equation At^2 + Bt + C = 0
 * Returns sorted real roots.
 */
export function solveQuadratic(A: number, B: number, C: number): number[] {
    const disc = B * B - 4 * A * C;
    if (disc < 0) return [];

    if (disc === 0) return [-B / (2 * A)];

    const sqrtDisc = Math.sqrt(disc);
    const t0 = (-B - sqrtDisc) / (2 * A);
    const t1 = (-B + sqrtDisc) / (2 * A);

    return [Math.min(t0, t1), Math.max(t0, t1)];
}

/**
 * Unit propagation direction for spherical angles measured from the fiber axis:
 * (sin(zenith)cos(azimuth), sin(zenith)sin(azimuth), cos(zenith))
 */
export function directionFromAngles(azimuth: number, zenith: number): Vector3 {
    return new Vector3(
        Math.sin(zenith) * Math.cos(azimuth),
        Math.sin(zenith) * Math.sin(azimuth),
        Math.cos(zenith)
    );
}

/**
 * Inverse of directionFromAngles. Azimuth lands in [-π, π].
 * `v` need not be unit length. An axis-aligned vector has no azimuth; it is reported as 0.
 */
export function anglesFromDirection(v: Vector3): { azimuth: number; zenith: number } {
    const zenith = Math.acos(MathUtils.clamp(v.z / v.length(), -1, 1));
    const rho = transverseRadius(v);
    if (zenith === 0 || rho === 0) {
        return { azimuth: 0, zenith };
    }

    const cos = MathUtils.clamp(v.x / rho, -1, 1);
    const azimuth = v.y / rho > 0 ? Math.acos(cos) : -Math.acos(cos);
    return { azimuth, zenith };
}
