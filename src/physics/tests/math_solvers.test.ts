import { describe, expect, test } from "vitest";
import { Vector3 } from "three";
import {
    anglesFromDirection,
    directionFromAngles,
    reflectVector,
    solveQuadratic
} from "../math_solvers";
import { createSeededRandom } from "../utils";

describe("directionFromAngles", () => {
    test("is unit length for every azimuth/zenith pair", () => {
        for (let az = -Math.PI; az <= Math.PI; az += Math.PI / 12) {
            for (let zen = 0; zen <= Math.PI; zen += Math.PI / 18) {
                expect(directionFromAngles(az, zen).length()).toBeCloseTo(1, 12);
            }
        }
    });

    test("zero zenith points down the axis", () => {
        const v = directionFromAngles(1.3, 0);
        expect(v.x).toBe(0);
        expect(v.y).toBe(0);
        expect(v.z).toBe(1);
    });
});

describe("anglesFromDirection", () => {
    test("recovers the angles a direction was built from", () => {
        const random = createSeededRandom(2024);
        for (let i = 0; i < 200; i++) {
            const az = (random() * 2 - 1) * Math.PI * 0.999;
            const zen = 0.001 + random() * (Math.PI / 2 - 0.002);
            const { azimuth, zenith } = anglesFromDirection(directionFromAngles(az, zen));
            expect(azimuth).toBeCloseTo(az, 9);
            expect(zenith).toBeCloseTo(zen, 9);
        }
    });

    test("axis-aligned direction reports azimuth 0", () => {
        expect(anglesFromDirection(new Vector3(0, 0, 1))).toEqual({ azimuth: 0, zenith: 0 });
    });

    test("azimuth sign follows the transverse y component", () => {
        expect(anglesFromDirection(new Vector3(0, 1, 1)).azimuth).toBeCloseTo(Math.PI / 2, 12);
        expect(anglesFromDirection(new Vector3(0, -1, 1)).azimuth).toBeCloseTo(-Math.PI / 2, 12);
        expect(anglesFromDirection(new Vector3(-1, 0, 1)).azimuth).toBeCloseTo(-Math.PI, 12);
    });

    test("accepts directions that are not unit length", () => {
        const { azimuth, zenith } = anglesFromDirection(new Vector3(0, 2, 2));
        expect(zenith).toBeCloseTo(Math.PI / 4, 12);
        expect(azimuth).toBeCloseTo(Math.PI / 2, 12);
        expect(anglesFromDirection(new Vector3(3, 0, 0)).zenith).toBeCloseTo(Math.PI / 2, 12);
    });

    test("slightly overlong z does not produce NaN", () => {
        const { azimuth, zenith } = anglesFromDirection(new Vector3(0, 0, 1 + 1e-15));
        expect(zenith).toBe(0);
        expect(azimuth).toBe(0);
    });
});

describe("reflectVector", () => {
    test("preserves the norm of the incident vector", () => {
        const random = createSeededRandom(99);
        for (let i = 0; i < 100; i++) {
            const incident = directionFromAngles(random() * 2 * Math.PI, random() * Math.PI);
            const normal = directionFromAngles(random() * 2 * Math.PI, random() * Math.PI);
            expect(reflectVector(incident, normal).length()).toBeCloseTo(incident.length(), 12);
        }
    });

    test("flips the normal component only", () => {
        const r = reflectVector(new Vector3(0.6, 0, 0.8), new Vector3(-1, 0, 0));
        expect(r.x).toBeCloseTo(-0.6, 12);
        expect(r.y).toBeCloseTo(0, 12);
        expect(r.z).toBeCloseTo(0.8, 12);
    });
});

describe("solveQuadratic", () => {
    test("returns sorted roots", () => {
        expect(solveQuadratic(1, 0, -4)).toEqual([-2, 2]);
    });

    test("returns a single root on a zero discriminant", () => {
        expect(solveQuadratic(1, -2, 1)).toEqual([1]);
    });

    test("returns no roots on a negative discriminant", () => {
        expect(solveQuadratic(1, 0, 1)).toEqual([]);
    });
});

describe("createSeededRandom", () => {
    test("produces the same sequence for the same seed", () => {
        const a = createSeededRandom(42);
        const b = createSeededRandom(42);
        const seqA = [a(), a(), a()];
        expect([b(), b(), b()]).toEqual(seqA);
    });

    test("follows the LCG recurrence", () => {
        const random = createSeededRandom(42);
        expect(random()).toBe(1083814273 / 4294967296);
    });

    test("stays within [0, 1)", () => {
        const random = createSeededRandom(7);
        for (let i = 0; i < 1000; i++) {
            const x = random();
            expect(x).toBeGreaterThanOrEqual(0);
            expect(x).toBeLessThan(1);
        }
    });
});
