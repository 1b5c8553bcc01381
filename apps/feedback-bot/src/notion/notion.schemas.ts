import { z } from 'zod';
import { MEETING_PROPS, PERSON_NAME_PROP } from './notion.constants';

const richTextItemSchema = z.object({ plain_text: z.string() });

export const titlePropertySchema = z.object({
  title: z.array(richTextItemSchema).min(1),
});

export const relationPropertySchema = z.object({
  relation: z.array(z.object({ id: z.string() })).min(1),
});

export const pageSchema = z.object({
  id: z.string(),
  properties: z.record(z.unknown()),
});

export const meetingPropertiesSchema = z.object({
  [MEETING_PROPS.name]: titlePropertySchema,
  [MEETING_PROPS.mentors]: relationPropertySchema,
  [MEETING_PROPS.student]: relationPropertySchema,
  [MEETING_PROPS.chatId]: z.object({
    rollup: z.object({
      array: z.array(z.object({ number: z.number().int() })).min(1),
    }),
  }),
  [MEETING_PROPS.date]: z.object({
    date: z.object({ start: z.string() }),
  }),
});

export const mentorRefSchema = z.object({
  properties: z.object({
    [MEETING_PROPS.mentors]: relationPropertySchema,
  }),
});

export const personPageSchema = z.object({
  properties: z.object({
    [PERSON_NAME_PROP]: titlePropertySchema,
  }),
});

export const summaryPageSchema = z.object({
  properties: z.object({
    [MEETING_PROPS.summary]: z
      .object({
        type: z.string(),
        rich_text: z.array(richTextItemSchema).optional(),
      })
      .optional(),
  }),
});

export function plainText(items: { plain_text: string }[]): string {
  return items.map((item) => item.plain_text).join('');
}
