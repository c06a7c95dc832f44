import pino from 'pino';
import { getEnvironment, isRunningInDocker } from '../config/environment';
const STDERR_DESTINATION = 2;

export function getTransport(): pino.TransportSingleOptions | undefined {
  const env = getEnvironment();

  // Tests log synchronously (and usually silently) so no worker thread outlives them
  if (env.NODE_ENV === 'test') {
    return undefined;
  }

  const isDevelopment = env.NODE_ENV === 'development';
  let pinoPrettyResolved: boolean;
  try {
    require.resolve('pino-pretty');
    pinoPrettyResolved = true;
  } catch {
    pinoPrettyResolved = false;
  }

  if (pinoPrettyResolved && isDevelopment && !isRunningInDocker()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR_DESTINATION, // Use stderr
      },
    };
  }
  return { target: 'pino/file', options: { destination: STDERR_DESTINATION } };
}
