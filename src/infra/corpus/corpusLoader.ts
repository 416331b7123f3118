import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { FaqEntry, ProductEntry } from "../../domain/types.js";
import { describeError, Logger } from "../../utils/logger.js";

// Records keep the field names of the shop's exported JSON files.
const productRecordSchema = z.object({
  商品名: z.string().default(""),
  説明: z.string().default(""),
  その他: z.string().default(""),
  リンク: z.string().default(""),
});

const faqRecordSchema = z.object({
  question: z.string().default(""),
  answer: z.string().default(""),
  related_word: z.array(z.string()).default([]),
  related_links: z.string().default(""),
});

export async function loadProductCorpus(
  filePath: string,
  logger: Logger,
): Promise<ProductEntry[]> {
  const records = await readRecords(filePath, productRecordSchema, logger);
  return records.map((record) =>
    Object.freeze({
      name: record.商品名,
      description: record.説明,
      notes: record.その他,
      link: record.リンク,
    }),
  );
}

export async function loadFaqCorpus(filePath: string, logger: Logger): Promise<FaqEntry[]> {
  const records = await readRecords(filePath, faqRecordSchema, logger);
  return records.map((record) =>
    Object.freeze({
      question: record.question,
      answer: record.answer,
      relatedWords: Object.freeze([...record.related_word]),
      relatedLinks: record.related_links,
    }),
  );
}

async function readRecords<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
  logger: Logger,
): Promise<Array<z.output<T>>> {
  const absolutePath = path.resolve(filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(absolutePath, "utf-8"));
  } catch (error) {
    logger.error("Corpus could not be read", {
      path: absolutePath,
      reason: describeError(error),
    });
    return [];
  }

  if (!Array.isArray(raw)) {
    logger.error("Corpus is not a JSON array", { path: absolutePath });
    return [];
  }

  const records: Array<z.output<T>> = [];
  raw.forEach((item: unknown, index) => {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      records.push(parsed.data);
      return;
    }
    logger.warn("Skipping invalid corpus record", {
      path: absolutePath,
      index,
      reason: parsed.error.issues[0]?.message ?? "invalid record",
    });
  });

  logger.info("Loaded corpus", { path: absolutePath, records: records.length });
  return records;
}
