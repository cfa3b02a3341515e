import { writeDefaultConfig } from "../../config/loader.js";
import { describeCause } from "../../errors.js";

export function initCommand(dir?: string): number {
    try {
        const configPath = writeDefaultConfig(dir);
        console.log(`Created configuration file: ${configPath}`);
        console.log("Edit the file to list your rule files and targets, then run 'rulerelay sync'.");
        return 0;
    } catch (err) {
        const message = describeCause(err);
        console.error(`Error: ${message}`);
        return 1;
    }
}
