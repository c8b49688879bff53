export {
  extractCustomerName,
  extractPressCustomer,
  extractHiringCompany,
  extractProcuringOrg,
  extractSpeakerOrg,
  type NameFilter,
} from './entity-name.js';
export { detectProducts, inferRoleProducts } from './tags.js';
export { inferRegion, withRegionHints } from './region.js';
