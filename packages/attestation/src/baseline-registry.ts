import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from '@aph/tee-core';
import type { BaselineReference } from '@aph/types';

const hex = (length: number) =>
  z
    .string()
    .transform((v) => v.trim().replace(/^0x/i, '').toLowerCase())
    .pipe(z.string().regex(new RegExp(`^[0-9a-f]{${length}}$`), `expected ${length} hex chars`));

const baselineEntrySchema = z
  .object({
    mrtd: hex(96),
    rtmr0: hex(96),
    rtmr1: hex(96),
    rtmr2: hex(96),
    rtmr3: hex(96),
    reportData: hex(128).optional(),
    report_data: hex(128).optional(),
  })
  .strict();

/** `{ "<vm identity>": { mrtd, rtmr0..3, reportData? } }` */
export const baselineFileSchema = z.record(z.string().min(1), baselineEntrySchema);

/** Expected measurements per VM identity. */
export class BaselineRegistry {
  private readonly baselines = new Map<string, BaselineReference>();

  constructor(baselines: Iterable<BaselineReference> = []) {
    for (const baseline of baselines) {
      this.set(baseline);
    }
  }

  /** Build from the parsed JSON document; throws ValidationError(InvalidBaseline). */
  static fromJson(document: unknown): BaselineRegistry {
    const parsed = baselineFileSchema.safeParse(document);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ValidationError('InvalidBaseline', `Invalid baseline file: ${details}`);
    }

    const registry = new BaselineRegistry();
    for (const [vmIdentity, { reportData, report_data, ...registers }] of Object.entries(parsed.data)) {
      const boundReportData = reportData ?? report_data;
      registry.set({
        vmIdentity,
        ...registers,
        ...(boundReportData !== undefined ? { reportData: boundReportData } : {}),
      });
    }
    return registry;
  }

  static async fromFile(path: string): Promise<BaselineRegistry> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      throw new ValidationError('InvalidBaseline', `Baseline file ${path} could not be read`, { cause: err });
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (err) {
      throw new ValidationError('InvalidBaseline', `Baseline file ${path} is not valid JSON`, { cause: err });
    }
    return BaselineRegistry.fromJson(document);
  }

  get(vmIdentity: string): BaselineReference | undefined {
    return this.baselines.get(vmIdentity);
  }

  has(vmIdentity: string): boolean {
    return this.baselines.has(vmIdentity);
  }

  set(baseline: BaselineReference): void {
    this.baselines.set(baseline.vmIdentity, baseline);
  }

  identities(): string[] {
    return [...this.baselines.keys()];
  }
}
