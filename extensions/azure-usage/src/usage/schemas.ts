/**
 * TypeBox schemas for the untrusted Consumption API payloads.
 */

import { Type } from "@sinclair/typebox";

export const RawUsageRecordSchema = Type.Object({
  id: Type.Optional(Type.String()),
  name: Type.Optional(Type.String()),
  /** `legacy` or `modern`; the two kinds name their fields differently. */
  kind: Type.Optional(Type.String()),
  properties: Type.Record(Type.String(), Type.Unknown()),
});

export const RawUsagePageSchema = Type.Object({
  value: Type.Array(RawUsageRecordSchema),
  nextLink: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});
