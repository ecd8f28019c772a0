/**
 * Runs every DomainTools call once. Needs DOMAINTOOLS_API_KEY in the environment or in `.env`.
 *
 *   npm run example:domaintools -- example.com
 */
import { AsyncDomainToolsConnector, DomainToolsConnector } from '../src/index.js';

const domain = process.argv[2] ?? 'example.com';

const dt = new DomainToolsConnector({ loadEnvVars: true, enableLogging: true, enableBackoff: true });
try {
  console.log(await dt.parsedWhois(domain).json());
  console.log(await dt.reverseIp(domain).json());
  console.log(await dt.reverseNameserver(`ns1.${domain}`).json());
  console.log(await dt.irisInvestigate({ domain }).json());
} finally {
  dt.close();
}

const asyncDt = new AsyncDomainToolsConnector({ loadEnvVars: true, enableLogging: true });
try {
  const [whois, iris] = await Promise.all([asyncDt.parsedWhois(domain), asyncDt.irisInvestigate({ domain })]);
  console.log(await whois.json());
  console.log(await iris.json());
} finally {
  await asyncDt.close();
}
