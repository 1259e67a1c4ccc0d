import type { Vector3 } from 'three';
import { v4 as uuidv4 } from 'uuid';
import { FiberConfigurationError } from './errors';

export type FiberKind = 'cylinder' | 'cone';

/**
 * A waveguide boundary plus the refractive indices on either side of it.
 *
 * Instances are immutable: the `with*` methods return a new fiber (with a
 * new id) and leave the receiver untouched, so one fiber can be shared by
 * any number of concurrent traces.
 */
export abstract class FiberGeometry {
    readonly id: string;
    readonly name: string;
    readonly coreIndex: number;
    readonly cladIndex: number;
    readonly zMax: number;              // Traced length along the axis [m]
    readonly diffusion: number | null;  // Diffuse reflection half-width [rad], null = specular wall

    abstract readonly kind: FiberKind;

    protected constructor(
        name: string,
        coreIndex: number,
        cladIndex: number,
        zMax: number,
        diffusion: number | null
    ) {
        requirePositive(name, 'core index', coreIndex);
        requirePositive(name, 'cladding index', cladIndex);
        requirePositive(name, 'length', zMax);
        if (diffusion !== null && !(diffusion >= 0)) {
            throw new FiberConfigurationError(`${name}: diffusion angle must be >= 0, got ${diffusion}`);
        }

        this.id = uuidv4();
        this.name = name;
        this.coreIndex = coreIndex;
        this.cladIndex = cladIndex;
        this.zMax = zMax;
        this.diffusion = diffusion;
    }

    /** Radius of the cylinder the intersection step solves against. */
    abstract get coreRadius(): number;

    /** Boundary radius at axial position z. */
    abstract radiusAt(z: number): number;

    /** Unit normal at a point on the boundary, pointing toward the axis. */
    abstract normalAt(point: Vector3): Vector3;

    abstract withRefractiveIndices(coreIndex: number, cladIndex: number): FiberGeometry;

    /**
     * asin(n_clad / n_core): a wall hit whose grazing complement drops below
     * this leaks into the cladding.
     */
    criticalAngle(): number {
        if (this.cladIndex > this.coreIndex) {
            throw new FiberConfigurationError(
                `${this.name}: cladding index ${this.cladIndex} exceeds core index ${this.coreIndex}, ` +
                'no total internal reflection is possible'
            );
        }
        return Math.asin(this.cladIndex / this.coreIndex);
    }

    /** Numerical aperture sqrt(n_core² - n_clad²). */
    numericalAperture(): number {
        return Math.sqrt(Math.max(0, this.coreIndex ** 2 - this.cladIndex ** 2));
    }
}

export function requirePositive(owner: string, what: string, value: number): void {
    if (!(value > 0) || !Number.isFinite(value)) {
        throw new FiberConfigurationError(`${owner}: ${what} must be a positive number, got ${value}`);
    }
}
