import { writeDefaultConfig } from "../../config/loader.js";
import { errorMessage } from "../../utils/guards.js";

interface InitOptions {
    config?: string;
}

export function initCommand(options: InitOptions): void {
    try {
        const configPath = writeDefaultConfig(options.config);
        console.log(`Created configuration file: ${configPath}`);
        console.log("Set store.token (or TERMSYNC_TOKEN), then run 'termsync sync'.");
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
    }
}
