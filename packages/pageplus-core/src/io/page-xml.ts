/**
 * PAGE-XML parse/serialize layer
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { PageXmlError } from '@pageplus/errors';
import { firstChildElement } from './dom';

export const PAGE_NAMESPACE_PREFIX = 'http://schema.primaresearch.org/PAGE/gts/pagecontent/';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export interface PageXmlDocument {
  document: Document;
  /** PcGts root element */
  root: Element;
  /** Page element below the root */
  page: Element;
  namespace: string;
}

export function isPageNamespace(namespace: string | null | undefined): namespace is string {
  return typeof namespace === 'string' && namespace.startsWith(PAGE_NAMESPACE_PREFIX);
}

/**
 * Parse a PAGE-XML document. Malformed XML, a foreign root namespace or a
 * missing Page element raise PageXmlError.
 */
export function parsePageXml(xml: string, source: string): PageXmlDocument {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      error: (message: string) => problems.push(message),
      fatalError: (message: string) => problems.push(message),
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(xml, 'text/xml');
  } catch (error) {
    throw new PageXmlError(`Cannot parse ${source}`, {
      source,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (problems.length > 0) {
    throw new PageXmlError(`Cannot parse ${source}`, { source, reason: problems[0] });
  }

  const root: Element | null = document.documentElement;
  const namespace = root ? root.namespaceURI : null;
  if (!root || !isPageNamespace(namespace)) {
    throw new PageXmlError(`${source} is not a PAGE-XML document`, { source, namespace: namespace ?? null });
  }
  const page = firstChildElement(root, 'Page');
  if (!page) {
    throw new PageXmlError(`${source} has no Page element`, { source });
  }
  return { document, root, page, namespace };
}

/**
 * Serialize with a single standalone XML declaration.
 */
export function serializePageXml(document: Document): string {
  const body = new XMLSerializer().serializeToString(document).replace(/^\s*<\?xml[^?]*\?>\s*/, '');
  return `${XML_DECLARATION}\n${body}`;
}

/**
 * Cheap check used when collecting inputs: true when `xml` parses and its
 * root element lives in a PAGE namespace.
 */
export function isPageXml(xml: string): boolean {
  try {
    parsePageXml(xml, '<input>');
    return true;
  } catch (error) {
    if (error instanceof PageXmlError) {
      return false;
    }
    throw error;
  }
}
