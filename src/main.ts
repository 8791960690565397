#!/usr/bin/env node
// src/main.ts - path tracer entry point

import { RaytracerApp } from './core/RaytracerApp';
import { createScene } from './scene/SceneFactory';
import { RENDER_CONFIG } from './utils/Constants';
import { ConsoleDisplay } from './utils/ConsoleDisplay';
import { parseCliArgs, USAGE } from './utils/CliArgs';
import { Logger } from './utils/Logger';

async function main(): Promise<void> {
    const logger = Logger.getInstance();
    const cli = parseCliArgs(process.argv.slice(2));

    if (cli.help) {
        console.log(USAGE);
        return;
    }

    logger.success('🚀 Starting path tracer...');

    const scene = createScene(cli.scene, cli.render.seed ?? RENDER_CONFIG.DEFAULT_SEED);
    const app = new RaytracerApp(scene, {
        render: cli.render,
        threaded: cli.threaded,
        frameBudgetMs: cli.frameBudgetMs,
    });

    try {
        app.initialize();
        ConsoleDisplay.showInitializationSummary(app);

        const passes = await app.run({ passes: cli.passes, timeLimitMs: cli.timeLimitMs });
        logger.success(`Rendering stopped after ${passes} complete passes`);

        await app.saveImage(cli.output);

        const monitor = app.getPerformanceMonitor();
        monitor.logDetailedStats();
        ConsoleDisplay.showFinalSummary(monitor.getStats(), cli.output);
    } finally {
        await app.cleanup();
    }
}

main().catch(error => {
    Logger.getInstance().error('Fatal error:', error);
    process.exitCode = 1;
});
