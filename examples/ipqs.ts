/**
 * Scans a URL with IPQualityScore. Needs IPQS_API_KEY in the environment or in `.env`.
 *
 *   npm run example:ipqs -- https://example.com
 */
import { AsyncIPQSConnector, IPQSConnector } from '../src/index.js';

const url = process.argv[2] ?? 'https://example.com';

const ipqs = new IPQSConnector({ loadEnvVars: true, enableLogging: true });
try {
  console.log(await ipqs.maliciousUrl(url, { strictness: 1 }).json());
} finally {
  ipqs.close();
}

const asyncIpqs = new AsyncIPQSConnector({ loadEnvVars: true, enableLogging: true, enableBackoff: true });
try {
  const res = await asyncIpqs.maliciousUrl(url, { strictness: 1, fast: true });
  console.log(await res.json());
} finally {
  await asyncIpqs.close();
}
