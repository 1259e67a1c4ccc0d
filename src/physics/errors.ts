import type { Vector3 } from 'three';

/**
 * Raised while building a fiber or starting a trace when the parameters
 * describe no physical waveguide (cone wider than it is long, cladding
 * index above the core index, ...).
 */
export class FiberConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FiberConfigurationError';
    }
}

/**
 * The ray's line never meets the core boundary from where it stands,
 * i.e. the ray sits outside the core. Fatal for that ray only.
 */
export class DegenerateIntersectionError extends Error {
    readonly position: Vector3;
    readonly azimuth: number;
    readonly zenith: number;
    readonly discriminant: number;

    constructor(position: Vector3, azimuth: number, zenith: number, discriminant: number) {
        const p = position;
        super(
            `Ray at (${p.x}, ${p.y}, ${p.z}) with azimuth ${azimuth} rad, zenith ${zenith} rad ` +
            `does not reach the core boundary (discriminant ${discriminant})`
        );
        this.name = 'DegenerateIntersectionError';
        this.position = position.clone();
        this.azimuth = azimuth;
        this.zenith = zenith;
        this.discriminant = discriminant;
    }
}
