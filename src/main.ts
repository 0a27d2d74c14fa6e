import path from "path";
import dotenv from "dotenv";

import { buildServer } from "./api/server";
import { resolveServerConfig } from "./config";

dotenv.config({ path: path.join(__dirname, "../.env") });

async function start() {
    const config = resolveServerConfig();
    const server = await buildServer(config);
    let closing = false;
    async function shutdown(signal:string) {
        if (closing) {
            return;
        }
        closing = true;
        server.log.info(`Received ${signal}, closing`);
        await server.close();
    }
    for (const signal of [ "SIGINT", "SIGTERM" ] as const) {
        process.once(signal, () => {
            shutdown(signal).catch(e => {
                server.log.error(e);
                process.exitCode = 1;
            });
        });
    }
    await server.listen({ host: config.host, port: config.port });
}

start().catch(e => {
    console.error(e);
    process.exitCode = 1;
});
