export interface LatLng {
    lat: number;
    lng: number;
}

/**
 * Linearly interpolates between two positions.
 */
export function lerpPosition(from: LatLng, to: LatLng, t: number): LatLng {
    return {
        lat: from.lat + (to.lat - from.lat) * t,
        lng: from.lng + (to.lng - from.lng) * t
    };
}

/**
 * Clamps a value between a minimum and maximum.
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/**
 * Exact coordinate equality. Change detection is by position only, so no tolerance is applied.
 */
export function samePosition(a: LatLng, b: LatLng): boolean {
    return a.lat === b.lat && a.lng === b.lng;
}

export function isFinitePosition(position: LatLng): boolean {
    return Number.isFinite(position.lat) && Number.isFinite(position.lng);
}

/**
 * Planar (coordinate-space) distance between two positions.
 */
export function planarDistance(a: LatLng, b: LatLng): number {
    return Math.hypot(b.lat - a.lat, b.lng - a.lng);
}

export function copyPosition(position: LatLng): LatLng {
    return { lat: position.lat, lng: position.lng };
}
