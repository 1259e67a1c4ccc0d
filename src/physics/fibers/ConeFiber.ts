import { Vector3 } from 'three';
import { FiberGeometry, requirePositive } from '../FiberGeometry';
import { FiberConfigurationError } from '../errors';

/**
 * ConeFiber: a tapered core whose radius shrinks linearly from `baseRadius`
 * at z = 0 to `topRadius` at z = zMax.
 *
 * The taper half-angle is asin((baseRadius - topRadius) / zMax), so the
 * radius change may not exceed the length. `c` is tan(angle).
 *
 * Intersections are still solved against a cylinder of the base radius
 * (see `coreRadius`); only the normal accounts for the slanted wall.
 */
export class ConeFiber extends FiberGeometry {
    readonly kind = 'cone' as const;
    readonly baseRadius: number;
    readonly topRadius: number;
    readonly angle: number;
    readonly c: number;

    constructor(
        zMax: number,
        baseRadius: number,
        topRadius: number,
        coreIndex: number = 1.445,
        cladIndex: number = 1.44,
        diffusion: number | null = null,
        name: string = "Cone Fiber"
    ) {
        super(name, coreIndex, cladIndex, zMax, diffusion);
        requirePositive(name, 'base radius', baseRadius);
        if (!(topRadius >= 0)) {
            throw new FiberConfigurationError(`${name}: top radius must be >= 0, got ${topRadius}`);
        }

        const sine = (baseRadius - topRadius) / zMax;
        if (sine < -1 || sine > 1) {
            throw new FiberConfigurationError(
                `${name}: radius change ${baseRadius - topRadius} exceeds length ${zMax}, taper angle undefined`
            );
        }

        this.baseRadius = baseRadius;
        this.topRadius = topRadius;
        this.angle = Math.asin(sine);
        this.c = Math.tan(this.angle);
    }

    get coreRadius(): number {
        return this.baseRadius;
    }

    radiusAt(z: number): number {
        return this.baseRadius - z * Math.sin(this.angle);
    }

    /**
     * -(x, y, z') / |(x, y, z')| with z' = -c²(z - baseRadius / c),
     * expanded so an untapered cone (c = 0) degrades to the radial normal.
     */
    normalAt(point: Vector3): Vector3 {
        const axial = this.c * this.baseRadius - this.c * this.c * point.z;
        return new Vector3(point.x, point.y, axial).normalize().negate();
    }

    withGeometry(zMax: number, baseRadius: number, topRadius: number): ConeFiber {
        return new ConeFiber(
            zMax, baseRadius, topRadius, this.coreIndex, this.cladIndex, this.diffusion, this.name
        );
    }

    withRefractiveIndices(coreIndex: number, cladIndex: number): ConeFiber {
        return new ConeFiber(
            this.zMax, this.baseRadius, this.topRadius, coreIndex, cladIndex, this.diffusion, this.name
        );
    }
}
