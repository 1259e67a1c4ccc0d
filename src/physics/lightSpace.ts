/**
 * Fiber Space coordinates.
 *
 * Z-axis: fiber axis (direction of propagation down the fiber)
 * XY-plane: transverse cross-section
 *
 * Thin helpers over THREE.js Vector3 so geometry code reads in terms of
 * the cross-section rather than raw components.
 */

import { Vector3 } from 'three';

/**
 * Radial distance from the fiber axis.
 */
export function transverseRadius(v: Vector3): number {
    return Math.sqrt(v.x * v.x + v.y * v.y);
}

/**
 * Unit vector in the cross-section pointing from `p` toward the axis.
 * Undefined (NaN) on the axis itself.
 */
export function inwardRadial(p: Vector3): Vector3 {
    const rho = transverseRadius(p);
    return new Vector3(-p.x / rho, -p.y / rho, 0);
}
