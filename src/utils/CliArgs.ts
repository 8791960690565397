import { parseArgs } from 'node:util';
import type { RenderOptionsInput } from '../core/RenderOptions';
import { getCameraPreset, isSceneName, SCENE_NAMES, type SceneName } from '../scene/SceneFactory';
import { RENDER_CONFIG, TICK_CONFIG } from './Constants';

export interface CliConfig {
    scene: SceneName;
    render: RenderOptionsInput;
    threaded: boolean;
    frameBudgetMs: number;
    passes?: number;
    timeLimitMs?: number;
    output: string;
    help: boolean;
}

export const USAGE = `Usage: strip-pathtracer [options]

  --scene <demo|random>   Scene to render (default: demo)
  --width <px>            Image width (default: ${RENDER_CONFIG.DEFAULT_WIDTH})
  --aspect <ratio>        Width / height, e.g. 1.7778 (default: 16/9)
  --depth <n>             Max bounces per path (default: ${RENDER_CONFIG.DEFAULT_MAX_DEPTH})
  --workers <n>           Number of strips / worker threads (default: 1)
  --seed <n>              RNG seed (default: ${RENDER_CONFIG.DEFAULT_SEED})
  --passes <n>            Stop after n passes (default: 10 if no --time-limit)
  --time-limit <ms>       Stop after this many milliseconds
  --budget <ms>           Time slice per tick (default: ${TICK_CONFIG.FRAME_BUDGET_MS})
  --inline                Render on the main thread instead of worker threads
  --out <file>            Output PPM file (default: ${RENDER_CONFIG.DEFAULT_OUTPUT})
  --help                  Show this help
`;

function parseNumber(flag: string, raw: string | undefined): number | undefined {
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new Error(`--${flag} expects a number, got '${raw}'`);
    }
    return value;
}

function parseSeed(raw: string | undefined): bigint | undefined {
    if (raw === undefined) return undefined;
    if (!/^(0x[0-9a-f]+|\d+)$/i.test(raw.trim())) {
        throw new Error(`--seed expects a non-negative integer, got '${raw}'`);
    }
    return BigInt(raw.trim());
}

export function parseCliArgs(argv: string[]): CliConfig {
    const { values } = parseArgs({
        args: argv,
        options: {
            scene: { type: 'string', default: 'demo' },
            width: { type: 'string' },
            aspect: { type: 'string' },
            depth: { type: 'string' },
            workers: { type: 'string' },
            seed: { type: 'string' },
            passes: { type: 'string' },
            'time-limit': { type: 'string' },
            budget: { type: 'string' },
            inline: { type: 'boolean', default: false },
            out: { type: 'string', default: RENDER_CONFIG.DEFAULT_OUTPUT },
            help: { type: 'boolean', default: false },
        },
        strict: true,
        allowPositionals: false,
    });

    const sceneName = values.scene ?? 'demo';
    if (!isSceneName(sceneName)) {
        throw new Error(`--scene must be one of ${SCENE_NAMES.join(', ')}, got '${sceneName}'`);
    }

    const render: RenderOptionsInput = { ...getCameraPreset(sceneName) };
    const width = parseNumber('width', values.width);
    const aspect = parseNumber('aspect', values.aspect);
    const depth = parseNumber('depth', values.depth);
    const workers = parseNumber('workers', values.workers);
    const seed = parseSeed(values.seed);

    if (width !== undefined) render.imageWidth = width;
    if (aspect !== undefined) render.aspectRatio = aspect;
    if (depth !== undefined) render.maxDepth = depth;
    if (workers !== undefined) render.workerCount = workers;
    if (seed !== undefined) render.seed = seed;

    let passes = parseNumber('passes', values.passes);
    const timeLimitMs = parseNumber('time-limit', values['time-limit']);
    if (passes === undefined && timeLimitMs === undefined) {
        passes = 10;
    }

    return {
        scene: sceneName,
        render,
        threaded: !(values.inline ?? false),
        frameBudgetMs: parseNumber('budget', values.budget) ?? TICK_CONFIG.FRAME_BUDGET_MS,
        passes,
        timeLimitMs,
        output: values.out ?? RENDER_CONFIG.DEFAULT_OUTPUT,
        help: values.help ?? false,
    };
}
