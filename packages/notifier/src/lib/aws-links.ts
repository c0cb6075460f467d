/**
 * AWS console deep links
 */

const AWS_CONSOLE = "https://console.aws.amazon.com";

export function lambdaConsoleLink(region: string, functionName: string): string {
  return `${AWS_CONSOLE}/lambda/home?region=${encodeURIComponent(region)}#/functions/${encodeURIComponent(functionName)}`;
}

/**
 * Link to a CloudWatch log group, or to one stream inside it. Group and
 * stream names contain "/" and "[]", so both are fully encoded.
 */
export function cloudwatchLogStreamLink(region: string, logGroup: string, logStream?: string): string {
  const base = `${AWS_CONSOLE}/cloudwatch/home?region=${encodeURIComponent(region)}#logEventViewer:group=${encodeURIComponent(logGroup)}`;
  if (logStream) {
    return `${base};stream=${encodeURIComponent(logStream)}`;
  }
  return base;
}

export interface EventLinks {
  logs?: string;
  lambda?: string;
  source?: string;
}

/**
 * Links derivable from a runtime context's caller metadata
 */
export function linksFromCaller(caller: Readonly<Record<string, string>> | undefined): EventLinks {
  if (!caller) return {};
  const links: EventLinks = {};
  const { region, logGroup, logStream, functionName, sourceCode } = caller;

  if (region && logGroup) {
    links.logs = cloudwatchLogStreamLink(region, logGroup, logStream);
  }
  if (region && functionName) {
    links.lambda = lambdaConsoleLink(region, functionName);
  }
  if (sourceCode) {
    links.source = sourceCode;
  }
  return links;
}
