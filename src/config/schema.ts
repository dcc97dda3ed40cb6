import { z } from "zod";

const feedName = z.string().min(1, "must not be empty");
const feedUrl = z.string().min(1, "must not be empty");

export const registryCommandSchema = z.discriminatedUnion("command", [
  z.object({ command: z.literal("add"), name: feedName, url: feedUrl }).strict(),
  z
    .object({
      command: z.literal("edit"),
      name: feedName,
      newName: feedName.optional(),
      url: feedUrl.optional(),
    })
    .strict(),
  z
    .object({ command: z.literal("update"), name: feedName, url: feedUrl })
    .strict(),
  z.object({ command: z.literal("delete"), name: feedName }).strict(),
  z.object({ command: z.literal("list") }).strict(),
  z
    .object({ command: z.literal("import"), file: z.string().min(1) })
    .strict(),
  z.object({ command: z.literal("help") }).strict(),
]);

export const watcherOptionsSchema = z.object({
  discordWebhook: z
    .string({ required_error: "Required" })
    .url("must be a valid URL"),
  feedConfig: z.string().min(1),
  cache: z.string().min(1),
});

export const importFileSchema = z.object({
  feeds: z
    .array(z.object({ name: feedName, url: z.string().url() }))
    .min(1)
    .superRefine((feeds, ctx) => {
      const names = new Set<string>();
      feeds.forEach((feed, index) => {
        if (names.has(feed.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, "name"],
            message: `duplicate feed name '${feed.name}'`,
          });
        }
        names.add(feed.name);
      });
    }),
});

export type RegistryCommand = z.infer<typeof registryCommandSchema>;
export type WatcherOptions = z.infer<typeof watcherOptionsSchema>;
export type ImportFile = z.infer<typeof importFileSchema>;
