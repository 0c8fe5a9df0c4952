/**
 * @module host-pattern
 * Host name pattern resolution
 *
 * Turns a template such as `ec2.{profile}.{name}` into a regular
 * expression with named capture groups, and matches the host token ssh
 * passes to the ProxyCommand against it.
 */

import { AmbiguousHostError, InvalidPatternError, UnresolvedHostError } from "./host-errors.js";

/**
 * Placeholders recognised in a host name template
 *
 * @public
 */
export const HOST_PLACEHOLDERS = ["name", "id", "profile"] as const;

/**
 * Placeholder name
 *
 * @public
 */
export type HostPlaceholder = (typeof HOST_PLACEHOLDERS)[number];

/**
 * Characters a placeholder captures
 */
const PLACEHOLDER_CAPTURE = String.raw`[\w-]+`;

/**
 * The instance an SSH host token refers to
 *
 * Exactly one of a Name tag value or an instance id.
 *
 * @public
 */
export type InstanceTarget =
  | { readonly kind: "name"; readonly name: string }
  | { readonly kind: "id"; readonly id: string };

/**
 * Attributes extracted from a host token
 *
 * @public
 */
export interface HostAttributes {
  readonly target: InstanceTarget;
  readonly profile?: string | undefined;
}

/**
 * Raw placeholder captures, empty captures omitted
 *
 * @public
 */
export type HostCaptures = Partial<Record<HostPlaceholder, string>>;

/**
 * Group name of the nth occurrence of a placeholder
 *
 * @internal
 */
function groupName(placeholder: HostPlaceholder, occurrence: number): string {
  return occurrence === 0 ? placeholder : `${placeholder}_${occurrence}`;
}

/**
 * Compile a host name template into a regular expression
 *
 * Every occurrence of `{name}`, `{id}` and `{profile}` becomes a named
 * capture group; the rest of the template is regular expression source.
 * Repeated placeholders get numbered groups (`name`, `name_1`, ...).
 * The expression is not anchored.
 *
 * @param pattern - Host name template
 * @returns Compiled expression
 * @throws \{InvalidPatternError\} When the substituted template is not a valid expression
 *
 * @public
 */
export function compileHostPattern(pattern: string): RegExp {
  let source = pattern;
  for (const placeholder of HOST_PLACEHOLDERS) {
    let occurrence = 0;
    source = source.replaceAll(
      `{${placeholder}}`,
      () => `(?<${groupName(placeholder, occurrence++)}>${PLACEHOLDER_CAPTURE})`,
    );
  }

  try {
    return new RegExp(source);
  } catch (error) {
    throw new InvalidPatternError(`invalid host name pattern: ${pattern}`, pattern, error);
  }
}

/**
 * Match a host token against a template
 *
 * A placeholder used more than once takes the value of its last
 * occurrence.
 *
 * @param hostname - Host token passed by ssh (`%h`)
 * @param pattern - Host name template
 * @returns Non-empty captures by placeholder; empty when the token does not match
 * @throws \{InvalidPatternError\} When the template does not compile
 *
 * @public
 */
export function matchHostPattern(hostname: string, pattern: string): HostCaptures {
  const groups = compileHostPattern(pattern).exec(hostname)?.groups ?? {};

  const captures: HostCaptures = {};
  for (const placeholder of HOST_PLACEHOLDERS) {
    let value: string | undefined;
    for (let occurrence = 0; groupName(placeholder, occurrence) in groups; occurrence++) {
      value = groups[groupName(placeholder, occurrence)];
    }
    if (value) {
      captures[placeholder] = value;
    }
  }
  return captures;
}

/**
 * Resolve a host token into host attributes
 *
 * @param hostname - Host token passed by ssh (`%h`)
 * @param pattern - Host name template
 * @returns The instance target and, when the template captures one, a profile
 * @throws \{InvalidPatternError\} When the template does not compile
 * @throws \{AmbiguousHostError\} When both a name and an id were captured
 * @throws \{UnresolvedHostError\} When neither a name nor an id was captured
 *
 * @example
 * ```typescript
 * resolveHostAttributes("ec2.web-1", "ec2.{name}");
 * // { target: { kind: "name", name: "web-1" } }
 * ```
 *
 * @public
 */
export function resolveHostAttributes(hostname: string, pattern: string): HostAttributes {
  const { name, id, profile } = matchHostPattern(hostname, pattern);

  if (name && id) {
    throw new AmbiguousHostError(
      "name and id could not be specified at same time",
      hostname,
      pattern,
    );
  }

  let target: InstanceTarget;
  if (name) {
    target = { kind: "name", name };
  } else if (id) {
    target = { kind: "id", id };
  } else {
    throw new UnresolvedHostError("neither name nor id is specified", hostname, pattern);
  }

  return profile ? { target, profile } : { target };
}
