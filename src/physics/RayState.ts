import { MathUtils, Vector3 } from 'three';
import type { RandomSource } from './types';
import { directionFromAngles } from './math_solvers';

/**
 * A ray inside the fiber: where it is and where it is heading.
 *
 * `azimuth` and `zenith` are authoritative; `direction` is re-derived from
 * them on every update and must not be written directly.
 */
export class RayState {
    azimuth: number;   // [rad], conventionally (-π, π]
    zenith: number;    // [rad] from the fiber axis, [0, π/2) for forward rays
    position: Vector3; // [m]
    direction: Vector3;

    constructor(azimuth: number = 0, zenith: number = 0, position: Vector3 = new Vector3()) {
        this.azimuth = azimuth;
        this.zenith = zenith;
        this.position = position.clone();
        this.direction = directionFromAngles(azimuth, zenith);
    }

    setValues(azimuth: number, zenith: number, position: Vector3): this {
        this.position = position.clone();
        return this.setAngles(azimuth, zenith);
    }

    setAngles(azimuth: number, zenith: number): this {
        this.azimuth = azimuth;
        this.zenith = zenith;
        this.direction = directionFromAngles(azimuth, zenith);
        return this;
    }

    setStartPoint(x: number = 0, y: number = 0, z: number = 0): this {
        this.position = new Vector3(x, y, z);
        return this;
    }

    /**
     * Random launch point on the z = 0 face within `radius` of the axis.
     * Polar angle is drawn from [0, π), so only the y >= 0 half of the face is covered.
     */
    generateStartPoint(radius: number, random: RandomSource): Vector3 {
        const phi = random() * Math.PI;
        const r = random() * radius;
        this.position = new Vector3(r * Math.cos(phi), r * Math.sin(phi), 0);
        return this.position.clone();
    }

    /** Zenith uniform in [0, maxZenithDegrees], azimuth uniform in [0°, 360°). */
    generateAngles(random: RandomSource, maxZenithDegrees: number = 30): { azimuth: number; zenith: number } {
        const zenith = MathUtils.degToRad(random() * maxZenithDegrees);
        const azimuth = MathUtils.degToRad(random() * 360);
        this.setAngles(azimuth, zenith);
        return { azimuth, zenith };
    }

    clone(): RayState {
        return new RayState(this.azimuth, this.zenith, this.position);
    }
}
