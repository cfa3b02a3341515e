import { configSchema } from "../../config/schema.js";

export function schemaCommand(): number {
    console.log(JSON.stringify(configSchema, null, 2));
    return 0;
}
