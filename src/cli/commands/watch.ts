import { runWatch } from "../../daemon/runner.js";
import { errorMessage } from "../../utils/guards.js";

interface WatchOptions {
    config?: string;
}

export async function watchCommand(options: WatchOptions): Promise<void> {
    try {
        console.log("Starting termsync watch mode (Ctrl+C to stop)...");
        await runWatch(options.config);
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
    }
}
