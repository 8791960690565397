export const RENDER_CONFIG = {
    DEFAULT_WIDTH: 400,
    DEFAULT_ASPECT_RATIO: 16 / 9,
    DEFAULT_MAX_DEPTH: 50,
    DEFAULT_SEED: 0x5eed,
    DEFAULT_OUTPUT: 'render.ppm',
} as const;

export const CAMERA_CONFIG = {
    VFOV: 20,                       // Vertical field of view in degrees
    LOOK_FROM: { x: -2, y: 2, z: 1 },
    LOOK_AT: { x: 0, y: 0, z: -1 },
    VUP: { x: 0, y: 1, z: 0 },
    DEFOCUS_ANGLE: 0,               // Degrees, 0 = pinhole
    FOCUS_DIST: 3.4,
} as const;

export const INTEGRATOR_CONFIG = {
    T_MIN: 0.001,                   // Shadow-acne epsilon
    NEAR_ZERO: 1e-8,
    BACKGROUND: {
        BOTTOM: { r: 1.0, g: 1.0, b: 1.0 },
        TOP: { r: 0.5, g: 0.7, b: 1.0 },
    },
} as const;

export const DISPLAY_CONFIG = {
    CHANNELS: 4,                    // RGBA
    GAMMA_SCALE: 255.999,
    OPAQUE_ALPHA: 255,
} as const;

export const TICK_CONFIG = {
    FRAME_BUDGET_MS: 16,
    STATS_INTERVAL: 60,             // Log a summary every N ticks
    MAX_TICK_HISTORY: 120,
} as const;

export const WORKER_CONFIG = {
    SCRIPT: 'strip.worker.js',
    LOCK_UNLOCKED: 0,
    LOCK_LOCKED: 1,
    PAUSE_CLEAR: 0,
    PAUSE_SET: 1,
} as const;

export const SCENE_CONFIG = {
    RANDOM: {
        GRID_EXTENT: 11,            // Small spheres on a (2n)² grid
        SMALL_RADIUS: 0.2,
        DIFFUSE_PROBABILITY: 0.8,
        METAL_PROBABILITY: 0.15,
        GLASS_INDEX: 1.5,
    },
} as const;
