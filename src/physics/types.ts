import type { Vector3 } from 'three';

// --- Coordinate System ---
// Fiber Space: Right-handed, Z along the fiber axis, origin at the centre of the launch face. Units: m.
// Angles are radians everywhere except in a finished Trajectory, which reports degrees.

/** Uniform generator on [0, 1), same contract as Math.random. */
export type RandomSource = () => number;

export enum Termination {
    ReachedMaxLength = 'z_max',
    ExceededCriticalAngle = 'critical_angle',
    ExceededReflectionBudget = 'max_reflections'
}

export interface AngleRecord {
    azimuth: number;   // [deg]
    zenith: number;    // [deg]
    incidence: number; // |v·n| expressed in degrees, 0 for the launch entry
}

export interface Reflection {
    azimuth: number;    // [rad]
    zenith: number;     // [rad]
    incidence: number;  // Signed cosine v·n of the incoming direction against the inward normal
    direction: Vector3; // Unit vector for `azimuth` and `zenith`
}

export interface Trajectory {
    geometryId: string;
    points: Vector3[];      // Fixed capacity (maxReflections), zero vectors past `count`
    angles: AngleRecord[];  // Parallel to `points`
    count: number;          // Populated entries, launch point included
    termination: Termination;
}

export interface TraceOptions {
    maxReflections: number;
    angleElimination: boolean;
    verbose: boolean;       // Human-readable termination diagnostics on the console
    random: RandomSource;   // Drives diffusion only
}

export const DEFAULT_TRACE_OPTIONS: Readonly<TraceOptions> = {
    maxReflections: 1000,
    angleElimination: true,
    verbose: false,
    random: Math.random
};
