export {
  PAGE_NAMESPACE_PREFIX,
  XML_DECLARATION,
  parsePageXml,
  serializePageXml,
  isPageXml,
  isPageNamespace,
} from './page-xml';
export type { PageXmlDocument } from './page-xml';
export { collectXmlFiles, DEFAULT_EXCLUDES } from './collect-files';
export { determineOutputPath, DEFAULT_MODIFIED_SUBDIR } from './output-path';
export type { ProcessingConfig } from './output-path';
export {
  isElement,
  childElements,
  firstChildElement,
  descendantElements,
  removeElement,
  insertChildElement,
  attributeValue,
  reorderElements,
  elementText,
  setElementText,
} from './dom';
