import type { Vector3 } from 'three';
import { FiberGeometry, requirePositive } from '../FiberGeometry';
import { inwardRadial } from '../lightSpace';

/**
 * Straight step-index fiber: a core cylinder of constant radius about the Z axis.
 */
export class CylinderFiber extends FiberGeometry {
    readonly kind = 'cylinder' as const;
    readonly claddingRadius: number;

    private readonly _coreRadius: number;

    constructor(
        coreRadius: number, claddingRadius: number,
        coreIndex: number, cladIndex: number,
        zMax: number,
        diffusion: number | null = null,
        name: string = "Cylinder Fiber"
    ) {
        super(name, coreIndex, cladIndex, zMax, diffusion);
        requirePositive(name, 'core radius', coreRadius);
        requirePositive(name, 'cladding radius', claddingRadius);
        this._coreRadius = coreRadius;
        this.claddingRadius = claddingRadius;
    }

    get coreRadius(): number {
        return this._coreRadius;
    }

    radiusAt(_z: number): number {
        return this._coreRadius;
    }

    /** Purely radial, independent of z. */
    normalAt(point: Vector3): Vector3 {
        return inwardRadial(point);
    }

    withGeometry(coreRadius: number, claddingRadius: number, zMax: number): CylinderFiber {
        return new CylinderFiber(
            coreRadius, claddingRadius, this.coreIndex, this.cladIndex, zMax, this.diffusion, this.name
        );
    }

    withRefractiveIndices(coreIndex: number, cladIndex: number): CylinderFiber {
        return new CylinderFiber(
            this._coreRadius, this.claddingRadius, coreIndex, cladIndex, this.zMax, this.diffusion, this.name
        );
    }
}
