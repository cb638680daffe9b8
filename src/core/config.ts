import { z } from "zod";

const WorkerSchema = z
  .object({
    command: z.string().min(1).default("cache-refresh-worker"),
    // Arguments placed before the per-unit arguments, e.g. a sub-command.
    args: z.array(z.string()).default([]),
    conf_flag: z.string().min(1).default("--conf"),
    debug_flag: z.string().min(1).default("--debug"),
    download_args: z.array(z.string()).default(["--download"]),
    timeout_seconds: z.number().int().positive().optional(),
    inherit_output: z.boolean().default(true),
  })
  .strict();

const LabelSchema = z
  .object({
    enabled: z.boolean().default(true),
    command: z.string().min(1).default("chcon"),
    // The output directory is appended as the last argument.
    args: z.array(z.string()).default(["-R", "-t", "httpd_sys_content_t"]),
  })
  .strict();

const MailSchema = z
  .object({
    command: z.string().min(1).default("mail"),
  })
  .strict();

export const BatchConfigSchema = z
  .object({
    config_dir: z.string().min(1).default("/etc/cache-refresh.d"),
    config_suffix: z
      .string()
      .min(1)
      .regex(/^[^/\\]+$/, "must not contain path separators")
      .default(".conf"),
    output_dir: z.string().min(1).default("/var/cache/cache-refresh"),
    lock_path: z.string().min(1).default("/var/run/cache-refresh.lock"),
    log_path: z.string().min(1).default("/var/log/cache-refresh/events.jsonl"),
    marker_filename: z
      .string()
      .min(1)
      .regex(/^[^/\\]+$/, "must be a plain file name")
      .default("timestamp.txt"),
    product_name: z.string().min(1).default("cache-refresh"),

    download: z.boolean().default(false),
    debug: z.boolean().default(false),
    hardlink: z.boolean().default(false),
    recipient: z.string().min(1).optional(),

    worker: WorkerSchema.default({}),
    label: LabelSchema.default({}),
    mail: MailSchema.default({}),
  })
  .strict();

export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type WorkerConfig = z.infer<typeof WorkerSchema>;
export type LabelConfig = z.infer<typeof LabelSchema>;
