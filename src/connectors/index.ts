/**
 * Connector entrypoint: vendor clients built on the brokers.
 * @module
 */
export {
  AsyncDomainToolsConnector,
  DOMAINTOOLS_API_KEY,
  DOMAINTOOLS_BASE_URL,
  DomainToolsConnector,
} from './domainTools.js';
export { AsyncIPQSConnector, IPQS_API_KEY, IPQS_BASE_URL, IPQSConnector } from './ipqs.js';
export { IRIS_INVESTIGATE_PARAMS, irisInvestigateParamsSchema } from './irisInvestigate.js';
