import {
  CODE_ASSIST_API_VERSION,
  CODE_ASSIST_ENDPOINT_PROD,
  GOOGLE_OAUTH_AUTH_URL,
  GOOGLE_OAUTH_REVOKE_URL,
  GOOGLE_OAUTH_TOKEN_URL,
  GOOGLE_USERINFO_URL,
} from "./code-assist";
import { fail, ok, unknownOperation, type RelayError, type Result } from "../errors";

export type HttpMethod = "GET" | "POST";

export const OPERATION_NAMES = [
  "oauth.authorize",
  "oauth.token",
  "oauth.revoke",
  "oauth.userinfo",
  "codeAssist.loadCodeAssist",
  "codeAssist.onboardUser",
  "codeAssist.generateContent",
  "codeAssist.streamGenerateContent",
  "codeAssist.countTokens",
] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

export type EndpointDescriptor = Readonly<{
  operationName: OperationName;
  baseUrl: string;
  pathTemplate: string;
  httpMethod: HttpMethod;
  defaultQuery?: Readonly<Record<string, string>>;
  /** Absolute URL including any default query string. */
  url: string;
}>;

export type EndpointRegistry = {
  resolve: (operationName: string) => Result<EndpointDescriptor, RelayError>;
  url: (
    descriptor: EndpointDescriptor,
    query?: Record<string, string>
  ) => string;
  operations: () => readonly OperationName[];
};

export type CreateEndpointRegistryOptions = {
  codeAssistBaseUrl?: string;
};

type EndpointDefinition = {
  baseUrl: string;
  pathTemplate: string;
  httpMethod: HttpMethod;
  defaultQuery?: Record<string, string>;
};

export function createEndpointRegistry(
  options: CreateEndpointRegistryOptions = {}
): EndpointRegistry {
  const codeAssistBase = (options.codeAssistBaseUrl ?? CODE_ASSIST_ENDPOINT_PROD).replace(
    /\/+$/,
    ""
  );
  const codeAssist = (method: string): EndpointDefinition => ({
    baseUrl: codeAssistBase,
    pathTemplate: `/${CODE_ASSIST_API_VERSION}:${method}`,
    httpMethod: "POST",
  });
  const absolute = (rawUrl: string, httpMethod: HttpMethod): EndpointDefinition => {
    const parsed = new URL(rawUrl);
    return { baseUrl: parsed.origin, pathTemplate: parsed.pathname, httpMethod };
  };

  const definitions: Record<OperationName, EndpointDefinition> = {
    "oauth.authorize": absolute(GOOGLE_OAUTH_AUTH_URL, "GET"),
    "oauth.token": absolute(GOOGLE_OAUTH_TOKEN_URL, "POST"),
    "oauth.revoke": absolute(GOOGLE_OAUTH_REVOKE_URL, "POST"),
    "oauth.userinfo": absolute(GOOGLE_USERINFO_URL, "GET"),
    "codeAssist.loadCodeAssist": codeAssist("loadCodeAssist"),
    "codeAssist.onboardUser": codeAssist("onboardUser"),
    "codeAssist.generateContent": codeAssist("generateContent"),
    "codeAssist.streamGenerateContent": {
      ...codeAssist("streamGenerateContent"),
      defaultQuery: { alt: "sse" },
    },
    "codeAssist.countTokens": codeAssist("countTokens"),
  };

  const table = new Map<string, EndpointDescriptor>(
    OPERATION_NAMES.map((name) => [name, freezeDescriptor(name, definitions[name])])
  );

  return Object.freeze({
    resolve: (operationName: string) => {
      const descriptor = table.get(operationName);
      return descriptor ? ok(descriptor) : fail(unknownOperation(operationName));
    },
    url: (descriptor: EndpointDescriptor, query?: Record<string, string>) =>
      buildUrl(descriptor, query),
    operations: () => OPERATION_NAMES,
  });
}

function freezeDescriptor(name: OperationName, definition: EndpointDefinition): EndpointDescriptor {
  const defaultQuery = definition.defaultQuery ? Object.freeze({ ...definition.defaultQuery }) : undefined;
  const base = {
    operationName: name,
    baseUrl: definition.baseUrl,
    pathTemplate: definition.pathTemplate,
    httpMethod: definition.httpMethod,
    defaultQuery,
  };
  return Object.freeze({ ...base, url: buildUrl(base) });
}

function buildUrl(
  descriptor: Pick<EndpointDescriptor, "baseUrl" | "pathTemplate" | "defaultQuery">,
  query?: Record<string, string>
): string {
  const params = new URLSearchParams({ ...descriptor.defaultQuery, ...query });
  const search = params.toString();
  // Code Assist paths carry a literal `:` (`/v1internal:onboardUser`).
  return `${descriptor.baseUrl}${descriptor.pathTemplate}${search ? `?${search}` : ""}`;
}
