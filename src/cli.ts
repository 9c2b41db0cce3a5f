#!/usr/bin/env node
import { clampCapacity } from "./config";
import { Pipeline } from "./pipeline/Pipeline";
import { attachConsoleReporter } from "./reporter/ConsoleReporter";

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
    const capacity = clampCapacity(argv[0]);
    const verbose = process.env.BURSTLINE_VERBOSE === '1';

    const pipeline = new Pipeline({ capacity });
    attachConsoleReporter(pipeline, { verbose });

    await pipeline.run();
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
}
