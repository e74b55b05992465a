import { createApp, createDependencies } from './presentation/app';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🎬 Gameplay Shorts Engine - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Wire services and start the retention sweeper
        console.log('🚀 Initializing application components...');
        const services = await createDependencies(config);
        await services.sweeper.sweep();
        services.sweeper.start();

        // 3. Start the HTTP server
        const app = createApp(config, services);
        const server = app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Concurrency limit: ${config.maxConcurrentVideos}`);
            console.log(`   Retention: ${config.videoRetentionMinutes} min`);
        });

        const shutdown = (signal: string) => {
            console.log(`🛑 ${signal} received, shutting down...`);
            services.sweeper.stop();
            server.close(() => process.exit(0));
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
