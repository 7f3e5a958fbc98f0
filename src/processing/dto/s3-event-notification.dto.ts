import { z } from 'zod';
import { FileEvent, RejectedRecord } from '../../domain/value-objects/file-event.vo';
import { errorMessage } from '../../domain/errors/pipeline.error';

export const S3EventRecordSchema = z.object({
  eventName: z.string().optional(),
  s3: z.object({
    bucket: z.object({
      name: z.string().min(1),
    }),
    object: z.object({
      key: z.string().min(1),
      size: z.number().int().nonnegative().optional(),
    }),
  }),
});

/**
 * Records are validated one by one so a malformed record cannot take the
 * rest of the message down with it.
 */
export const S3EventNotificationSchema = z.object({
  Records: z.array(z.unknown()),
});

/**
 * Sent by S3 when a notification configuration is created or updated
 */
export const S3TestEventSchema = z.object({
  Event: z.literal('s3:TestEvent'),
});

/** Used to name a record whose key cannot be read. */
const RecordKeySchema = z.object({
  s3: z.object({ object: z.object({ key: z.string().min(1) }) }),
});

export type S3EventRecordDto = z.infer<typeof S3EventRecordSchema>;
export type S3EventNotificationDto = z.infer<typeof S3EventNotificationSchema>;

export interface ParsedRecords {
  events: FileEvent[];
  rejected: RejectedRecord[];
}

export function isS3TestEvent(data: unknown): boolean {
  return S3TestEventSchema.safeParse(data).success;
}

export function validateS3EventNotification(data: unknown): S3EventNotificationDto {
  return S3EventNotificationSchema.parse(data);
}

/**
 * S3 URL-encodes object keys in notifications, with `+` for spaces.
 * Throws `URIError` on a malformed escape sequence.
 */
export function decodeObjectKey(encodedKey: string): string {
  return decodeURIComponent(encodedKey.replace(/\+/g, ' '));
}

function describeRecord(record: unknown, index: number): string {
  const keyed = RecordKeySchema.safeParse(record);
  return keyed.success ? keyed.data.s3.object.key : `Records[${index}]`;
}

export function toFileEvents(notification: S3EventNotificationDto): ParsedRecords {
  const parsed: ParsedRecords = { events: [], rejected: [] };

  notification.Records.forEach((raw, index) => {
    const record = S3EventRecordSchema.safeParse(raw);
    if (!record.success) {
      const issue = record.error.errors[0];
      parsed.rejected.push({
        objectKey: describeRecord(raw, index),
        reason: issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid record',
      });
      return;
    }

    const { bucket, object } = record.data.s3;
    try {
      parsed.events.push({
        sourceLocation: bucket.name,
        objectKey: decodeObjectKey(object.key),
        declaredSizeBytes: object.size,
      });
    } catch (error) {
      parsed.rejected.push({
        objectKey: object.key,
        reason: `Undecodable object key: ${errorMessage(error)}`,
      });
    }
  });

  return parsed;
}
