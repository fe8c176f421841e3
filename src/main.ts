import { config } from './config';
import { buildServer } from './server';

buildServer()
    .then(async (app) => {
        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
            process.once(signal, () => {
                app.log.info({ signal }, 'shutting down');
                app.close().then(
                    () => process.exit(0),
                    (err: unknown) => {
                        app.log.error({ err }, 'shutdown failed');
                        process.exit(1);
                    },
                );
            });
        }
        await app.listen({ port: config.port, host: config.host });
    })
    .catch((err) => {
        // eslint-disable-next-line no-console
        console.error(err);
        process.exit(1);
    });
