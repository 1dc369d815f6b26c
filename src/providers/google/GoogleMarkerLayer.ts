/// <reference types="@types/google.maps" />
import type { InfoWindowContent, MarkerSnapshot, SvgIconConfig } from '../../engine/types.js';

/**
 * The subset of google.maps.Marker the layer drives.
 */
export interface MarkerHandle {
    setOptions(options: google.maps.MarkerOptions): void;
    setMap(map: google.maps.Map | null): void;
    addListener(eventName: string, handler: () => void): unknown;
}

/**
 * The subset of google.maps.InfoWindow the layer drives.
 */
export interface InfoWindowHandle {
    setContent(content: string): void;
    setPosition(position: google.maps.LatLngLiteral): void;
    open(options: google.maps.InfoWindowOpenOptions): void;
    close(): void;
}

export type MarkerFactory = (options: google.maps.MarkerOptions) => MarkerHandle;
export type InfoWindowFactory = (options: google.maps.InfoWindowOptions) => InfoWindowHandle;

export interface GoogleMarkerLayerFactories {
    createMarker?: MarkerFactory;
    createInfoWindow?: InfoWindowFactory;
}

const createGoogleMarker: MarkerFactory = (options) => new google.maps.Marker(options);
const createGoogleInfoWindow: InfoWindowFactory = (options) => new google.maps.InfoWindow(options);

interface LayerEntry {
    marker: MarkerHandle;
    infoWindow: InfoWindowHandle;
    content: string;
    position: google.maps.LatLngLiteral;
}

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * HTML for a marker's info window: bold title over the snippet.
 * Empty when the snapshot carries neither.
 */
export function infoWindowHtml(content: InfoWindowContent | undefined): string {
    const lines: string[] = [];
    if (content?.title) lines.push(`<strong>${escapeHtml(content.title)}</strong>`);
    if (content?.snippet) lines.push(escapeHtml(content.snippet));
    return lines.join('<br>');
}

function buildSvgIcon(config: SvgIconConfig, rotation: number | undefined): google.maps.Symbol {
    return {
        path: config.path,
        fillColor: config.fillColor || '#FFFFFF',
        fillOpacity: config.fillOpacity ?? 1,
        strokeColor: config.strokeColor || 'transparent',
        strokeWeight: config.strokeWeight ?? 0,
        scale: config.scale ?? 1,
        rotation: rotation ?? 0,
        anchor: config.anchor ? new google.maps.Point(config.anchor.x, config.anchor.y) : null
    };
}

/**
 * Translates one rendered snapshot into Google marker options.
 * Google markers have no tap-consumption or flat flags; those fields are not forwarded.
 */
export function toMarkerOptions(snapshot: MarkerSnapshot): google.maps.MarkerOptions {
    const options: google.maps.MarkerOptions = {
        position: { lat: snapshot.position.lat, lng: snapshot.position.lng },
        opacity: snapshot.alpha ?? 1,
        draggable: snapshot.draggable ?? false,
        visible: snapshot.visible ?? true,
        zIndex: snapshot.zIndex ?? 0,
        title: snapshot.infoWindow?.title ?? snapshot.id
    };

    if (snapshot.icon) {
        options.icon = buildSvgIcon(snapshot.icon, snapshot.rotation);
    }

    return options;
}

/**
 * Keeps a set of google.maps.Marker objects in sync with the engine's rendered output.
 * Pass {@link render} as the engine's `onRender` callback.
 *
 * Each marker gets its own info window, opened on click at the marker's current
 * position and showing `infoWindow.title` and `infoWindow.snippet`.
 */
export class GoogleMarkerLayer<M extends MarkerSnapshot = MarkerSnapshot> {
    private markers = new Map<string, LayerEntry>();
    private createMarker: MarkerFactory;
    private createInfoWindow: InfoWindowFactory;

    constructor(
        private map: google.maps.Map | null,
        factories: GoogleMarkerLayerFactories = {}
    ) {
        this.createMarker = factories.createMarker ?? createGoogleMarker;
        this.createInfoWindow = factories.createInfoWindow ?? createGoogleInfoWindow;
    }

    get size(): number {
        return this.markers.size;
    }

    render = (snapshots: ReadonlySet<M>): void => {
        const seen = new Set<string>();

        snapshots.forEach(snapshot => {
            seen.add(snapshot.id);
            const options = toMarkerOptions(snapshot);
            const content = infoWindowHtml(snapshot.infoWindow);
            const existing = this.markers.get(snapshot.id);

            if (existing) {
                existing.marker.setOptions(options);
                existing.position = { lat: snapshot.position.lat, lng: snapshot.position.lng };
                existing.infoWindow.setPosition(existing.position);
                if (content !== existing.content) {
                    existing.content = content;
                    existing.infoWindow.setContent(content);
                    if (!content) existing.infoWindow.close();
                }
            } else {
                this.addMarker(snapshot, options, content);
            }
        });

        this.markers.forEach((entry, id) => {
            if (!seen.has(id)) {
                this.detach(entry);
                this.markers.delete(id);
            }
        });
    };

    clear(): void {
        this.markers.forEach(entry => this.detach(entry));
        this.markers.clear();
    }

    private addMarker(snapshot: M, options: google.maps.MarkerOptions, content: string): void {
        const position = { lat: snapshot.position.lat, lng: snapshot.position.lng };
        const entry: LayerEntry = {
            marker: this.createMarker({ ...options, map: this.map }),
            infoWindow: this.createInfoWindow({ content, position }),
            content,
            position
        };

        entry.marker.addListener('click', () => {
            if (!entry.content) return;
            entry.infoWindow.setPosition(entry.position);
            entry.infoWindow.open({ map: this.map });
        });

        this.markers.set(snapshot.id, entry);
    }

    private detach(entry: LayerEntry): void {
        entry.infoWindow.close();
        entry.marker.setMap(null);
    }
}
