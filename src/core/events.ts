/**
 * Object-created notifications, delivered directly from S3 or wrapped in an
 * SNS envelope whose `Message` is the JSON-encoded S3 notification.
 */
import { z } from 'zod';

export interface ObjectRef {
  bucket: string;
  key: string;
}

const S3RecordSchema = z.object({
  s3: z.object({
    bucket: z.object({ name: z.string() }),
    object: z.object({ key: z.string() }),
  }),
});

const S3EventSchema = z.object({
  Records: z.array(S3RecordSchema).min(1),
});

const SnsEventSchema = z.object({
  Records: z
    .array(
      z.object({
        Sns: z.object({ Message: z.string() }),
      })
    )
    .min(1),
});

/** Keys in notifications are URL-encoded with `+` for spaces. */
export function decodeObjectKey(key: string): string {
  const spaced = key.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch {
    // stray '%' that is not an escape
    return spaced;
  }
}

function fromS3Event(event: unknown): ObjectRef[] | null {
  const parsed = S3EventSchema.safeParse(event);
  if (!parsed.success) return null;
  return parsed.data.Records.map((record) => ({
    bucket: record.s3.bucket.name,
    key: decodeObjectKey(record.s3.object.key),
  }));
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Object references carried by a trigger event. Unrecognised events yield [].
 */
export function extractObjectRefs(event: unknown): ObjectRef[] {
  const direct = fromS3Event(event);
  if (direct) return direct;

  const sns = SnsEventSchema.safeParse(event);
  if (!sns.success) return [];

  const refs: ObjectRef[] = [];
  for (const record of sns.data.Records) {
    const inner = fromS3Event(parseJson(record.Sns.Message));
    if (inner) refs.push(...inner);
  }
  return refs;
}
