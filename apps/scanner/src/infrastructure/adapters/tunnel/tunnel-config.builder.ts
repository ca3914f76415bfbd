import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { formatZodIssues } from '@ces/config';
import { ConfigError, FileSystemError, type TunnelTarget } from '@ces/domain';
import { OUTBOUND_TEMPLATE_FILE_NAME, TUNNEL_TEMPLATE_FILE_NAME } from '@ces/scanner/infrastructure/constants';
import { z } from 'zod';

// Unknown keys pass through untouched: the tunnel binary owns the format.
const tunnelTemplateSchema = z.looseObject({
  inbounds: z.array(z.looseObject({})),
  outbounds: z.array(z.looseObject({})),
  route: z.looseObject({
    rules: z.array(z.looseObject({})),
  }),
});

const outboundTemplateSchema = z.looseObject({
  type: z.string().min(1),
});

export type TunnelTemplate = z.infer<typeof tunnelTemplateSchema>;
export type OutboundTemplate = z.infer<typeof outboundTemplateSchema>;
export type TunnelDocument = TunnelTemplate;

export interface ListenerOptions {
  listenIp: string;
  portBase: number;
}

/**
 * Expands the tunnel template with one SOCKS listener, one outbound and one
 * routing rule per target. Template entries keep their place ahead of the
 * generated ones.
 */
export class TunnelConfigBuilder {
  constructor(
    private readonly template: TunnelTemplate,
    private readonly outboundTemplate: OutboundTemplate,
    private readonly listener: ListenerOptions,
  ) {}

  build(targets: readonly TunnelTarget[]): TunnelDocument {
    const inbounds = targets.map((_, index) => ({
      type: 'socks',
      tag: inboundTag(index),
      listen: this.listener.listenIp,
      listen_port: this.listener.portBase + index,
      tcp_fast_open: true,
      users: [],
    }));
    const outbounds = targets.map((target, index) => ({
      ...structuredClone(this.outboundTemplate),
      tag: outboundTag(index),
      server: target.address,
    }));
    const rules = targets.map((_, index) => ({
      inbound: [inboundTag(index)],
      outbound: outboundTag(index),
    }));

    return {
      ...structuredClone(this.template),
      inbounds: [...structuredClone(this.template.inbounds), ...inbounds],
      outbounds: [...structuredClone(this.template.outbounds), ...outbounds],
      route: {
        ...structuredClone(this.template.route),
        rules: [...structuredClone(this.template.route.rules), ...rules],
      },
    };
  }

  static async fromDataDir(dataDir: string, listener: ListenerOptions): Promise<TunnelConfigBuilder> {
    const [template, outboundTemplate] = await Promise.all([
      readTemplate(path.join(dataDir, TUNNEL_TEMPLATE_FILE_NAME), tunnelTemplateSchema),
      readTemplate(path.join(dataDir, OUTBOUND_TEMPLATE_FILE_NAME), outboundTemplateSchema),
    ]);
    return new TunnelConfigBuilder(template, outboundTemplate, listener);
  }
}

export function inboundTag(index: number): string {
  return `inbound-${index}`;
}

export function outboundTag(index: number): string {
  return `outbound-${index}`;
}

export function parseTemplate<Schema extends z.ZodType>(raw: unknown, schema: Schema, source: string): z.infer<Schema> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Template ${source} is invalid:\n${formatZodIssues(result.error.issues)}`);
  }
  return result.data;
}

async function readTemplate<Schema extends z.ZodType>(filePath: string, schema: Schema): Promise<z.infer<Schema>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const ioError = FileSystemError.from(filePath, error);
    throw new ConfigError(ioError.isNotFound ? `Template not found: ${filePath}` : ioError.message, { cause: ioError });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Template ${filePath} is not valid JSON: ${(error as Error).message}`, { cause: error });
  }
  return parseTemplate(raw, schema, filePath);
}
