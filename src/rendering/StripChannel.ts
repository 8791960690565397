import type { RenderOptions } from '../core/RenderOptions';
import type { Scene, SceneDescriptor } from '../scene/Scene';
import type { PauseFlag } from './PauseFlag';
import type { StripBuffer, StripLayout } from './StripBuffer';

/**
 * Coordinator-side handle of one strip worker.
 *
 * `requestPasses` hands the worker a target and resolves with the worker's
 * completed pass count once it has stopped (target reached or pause observed).
 * Only one request may be outstanding per channel.
 */
export interface StripChannel {
    readonly layout: StripLayout;
    readonly buffer: StripBuffer;
    requestPasses(passesWanted: number): Promise<number>;
    terminate(): Promise<void>;
}

export interface StripChannelContext {
    scene: Scene;
    options: RenderOptions;
    layout: StripLayout;
    pause: PauseFlag;
}

export type StripChannelFactory = (context: StripChannelContext) => StripChannel;

// ===== WORKER THREAD PROTOCOL =====

export interface StripWorkerInit {
    layout: StripLayout;
    options: RenderOptions;
    scene: SceneDescriptor;
    pixels: SharedArrayBuffer;
    pause: SharedArrayBuffer;
}

export interface RenderRequest {
    type: 'render';
    passesWanted: number;
}

export interface RenderReport {
    type: 'report';
    stripIndex: number;
    renderPasses: number;
}

export interface WorkerFailure {
    type: 'failure';
    stripIndex: number;
    message: string;
    stack?: string;
}

export type StripWorkerReply = RenderReport | WorkerFailure;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

export function isRenderRequest(value: unknown): value is RenderRequest {
    return isRecord(value) && value.type === 'render' && typeof value.passesWanted === 'number';
}

export function isStripWorkerReply(value: unknown): value is StripWorkerReply {
    if (!isRecord(value) || typeof value.stripIndex !== 'number') return false;
    if (value.type === 'report') return typeof value.renderPasses === 'number';
    if (value.type === 'failure') return typeof value.message === 'string';
    return false;
}

export function isStripWorkerInit(value: unknown): value is StripWorkerInit {
    return isRecord(value) &&
        isRecord(value.layout) &&
        isRecord(value.options) &&
        typeof value.options.seed === 'bigint' &&
        isRecord(value.scene) &&
        Array.isArray(value.scene.spheres) &&
        Array.isArray(value.scene.materials) &&
        value.pixels instanceof SharedArrayBuffer &&
        value.pause instanceof SharedArrayBuffer;
}
