/**
 * ConsoleDisplay - formatted terminal overview of a render session
 */

import type { RaytracerApp } from '../core/RaytracerApp';
import type { PerformanceStats } from './PerformanceMonitor';

const BOX_WIDTH = 58;

export class ConsoleDisplay {
    private static readonly COLORS = {
        reset: '\x1b[0m',
        bright: '\x1b[1m',
        dim: '\x1b[2m',
        green: '\x1b[32m',
        yellow: '\x1b[33m',
        blue: '\x1b[34m',
        cyan: '\x1b[36m',
    };

    private static useColor(): boolean {
        return Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
    }

    private static paint(color: keyof typeof ConsoleDisplay.COLORS, text: string): string {
        if (!ConsoleDisplay.useColor()) return text;
        return `${ConsoleDisplay.COLORS[color]}${text}${ConsoleDisplay.COLORS.reset}`;
    }

    private static section(title: string, color: keyof typeof ConsoleDisplay.COLORS, rows: Array<[string, string]>): string[] {
        const lines = [ConsoleDisplay.paint(color, `┌─ ${title} ${'─'.repeat(Math.max(0, BOX_WIDTH - title.length - 4))}┐`)];
        for (const [label, value] of rows) {
            const content = `${label}: ${value}`.padEnd(BOX_WIDTH - 2);
            lines.push(`${ConsoleDisplay.paint(color, '│')} ${content}${ConsoleDisplay.paint(color, '│')}`);
        }
        lines.push(ConsoleDisplay.paint(color, `└${'─'.repeat(BOX_WIDTH)}┘`));
        return lines;
    }

    public static formatInitializationSummary(app: RaytracerApp): string[] {
        const options = app.getOptions();
        const { width, height } = app.getImageSize();
        const strips = app.getStripLayouts();
        const widths = strips.map(s => s.width);

        return [
            ConsoleDisplay.paint('bright', '⚡ PATH TRACER - INITIALIZATION COMPLETE ⚡'),
            ...ConsoleDisplay.section('🎬 SCENE', 'green', [
                ['Spheres', String(app.getSphereCount())],
                ['Camera', `(${options.lookFrom.x}, ${options.lookFrom.y}, ${options.lookFrom.z}) -> (${options.lookAt.x}, ${options.lookAt.y}, ${options.lookAt.z})`],
                ['Field of view', `${options.vfov}°`],
                ['Defocus', `${options.defocusAngle}° at ${options.focusDist}`],
            ]),
            ...ConsoleDisplay.section('🧵 RENDERER', 'blue', [
                ['Image', `${width}x${height}`],
                ['Max depth', String(options.maxDepth)],
                ['Strips', `${strips.length} (${Math.min(...widths)}-${Math.max(...widths)} px wide)`],
                ['Mode', app.isThreaded() ? 'worker threads' : 'inline'],
                ['Seed', options.seed.toString()],
            ]),
        ];
    }

    public static formatFinalSummary(stats: PerformanceStats, outputPath: string | null): string[] {
        return ConsoleDisplay.section('🏁 RESULT', 'cyan', [
            ['Passes', String(stats.completedPasses)],
            ['Ticks', String(stats.ticks)],
            ['Elapsed', `${(stats.elapsedMs / 1000).toFixed(2)}s`],
            ['Samples/s', Math.round(stats.samplesPerSecond).toLocaleString('en-US')],
            ['Output', outputPath ?? '(not saved)'],
        ]);
    }

    public static showInitializationSummary(app: RaytracerApp): void {
        console.log(ConsoleDisplay.formatInitializationSummary(app).join('\n'));
    }

    public static showFinalSummary(stats: PerformanceStats, outputPath: string | null): void {
        console.log(ConsoleDisplay.formatFinalSummary(stats, outputPath).join('\n'));
    }
}
