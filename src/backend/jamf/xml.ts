import { DOMParser } from "@xmldom/xmldom";
import xpath from "xpath";

/** Where the Classic API puts a computer's internal id. */
export const DEVICE_ID_XPATH = "//computer/general/id/text()";

/**
 * Extract the device id from a `/JSSResource/computers/...` XML document.
 *
 * @returns the id, or `""` for empty, malformed or non-matching input.
 */
export function extractDeviceId(xml: string): string {
  if (xml.trim().length === 0) {
    return "";
  }

  let malformed = false;
  const markMalformed = (): void => {
    malformed = true;
  };

  try {
    const doc = new DOMParser({
      errorHandler: { warning: () => undefined, error: markMalformed, fatalError: markMalformed },
    }).parseFromString(xml, "text/xml");
    if (malformed || !doc) {
      return "";
    }

    const selected = xpath.select(DEVICE_ID_XPATH, doc);
    if (!xpath.isArrayOfNodes(selected)) {
      return "";
    }
    return selected
      .map((node) => node.nodeValue ?? "")
      .join("")
      .trim();
  } catch {
    // xmldom throws on some fatal errors instead of reporting them
    return "";
  }
}
