import type { Curve } from "../types.js";

const BEZIER_EPSILON = 1e-6;
const BEZIER_MAX_STEPS = 64;

function evaluateCubic(a: number, b: number, m: number): number {
    return 3 * a * (1 - m) * (1 - m) * m + 3 * b * (1 - m) * m * m + m * m * m;
}

/**
 * Builds a cubic Bézier easing curve through (0,0), (x1,y1), (x2,y2), (1,1),
 * the same parametrization as CSS `cubic-bezier()`.
 * x is solved by bisection, which stays stable for any control points in [0, 1].
 */
export function cubicBezier(x1: number, y1: number, x2: number, y2: number): Curve {
    return (t: number): number => {
        if (t <= 0) return 0;
        if (t >= 1) return 1;

        let start = 0;
        let end = 1;
        let midpoint = 0.5;
        for (let step = 0; step < BEZIER_MAX_STEPS; step++) {
            midpoint = (start + end) / 2;
            const estimate = evaluateCubic(x1, x2, midpoint);
            if (Math.abs(t - estimate) < BEZIER_EPSILON) break;
            if (estimate < t) start = midpoint;
            else end = midpoint;
        }
        return evaluateCubic(y1, y2, midpoint);
    };
}

const linear: Curve = (t) => t;

/**
 * Named curves. `Curves.linear` is the only curve the timer backend accepts;
 * configuration compares against it by identity.
 */
export const Curves = Object.freeze({
    linear,
    ease: cubicBezier(0.25, 0.1, 0.25, 1),
    easeIn: cubicBezier(0.42, 0, 1, 1),
    easeOut: cubicBezier(0, 0, 0.58, 1),
    easeInOut: cubicBezier(0.42, 0, 0.58, 1),
    fastOutSlowIn: cubicBezier(0.4, 0, 0.2, 1),
    decelerate: ((t) => 1 - (1 - t) * (1 - t)) satisfies Curve,
});

export type CurveName = keyof typeof Curves;
