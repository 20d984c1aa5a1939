import { getPollerConfig, loadEnvironment } from './config';
import { AwsMetadataResolver } from './metadata/AwsMetadataResolver';
import { LogPoller } from './poller/LogPoller';
import { createS3Client, S3ObjectStore } from './s3/S3ObjectStore';

async function main(): Promise<void> {
  loadEnvironment();
  const config = getPollerConfig();

  console.log('🔑 AWS region:', config.region || 'NOT SET (using instance metadata)');

  const poller = new LogPoller(config, {
    objectStore: new S3ObjectStore(createS3Client({ region: config.region })),
    metadataResolver: new AwsMetadataResolver({ region: config.region })
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, stopping log pollers...`);
    poller.stop().catch((error) => {
      console.error('Failed to stop log pollers:', error);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await poller.run();
  } catch (error) {
    await poller.stop();
    throw error;
  }
  console.log('✅ Log pollers stopped');
}

main().catch((error) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
