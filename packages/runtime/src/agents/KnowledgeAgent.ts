import { promises as fs } from "fs";
import path from "path";
import { KNOWLEDGE_ANSWER_TEMPLATE } from "../llm/prompts.js";
import type { KnowledgeAdapter, Oracle } from "../types/index.js";

export const EMPTY_KNOWLEDGE_ANSWER = "Knowledge base is empty.";

export const UNCONFIGURED_ORACLE_PREFIX = "(LLM not configured) ";

export interface KnowledgeAgentOptions {
  /** 存放知识文本的目录，每个 .txt 文件是一个知识单元 */
  directory: string;
  oracle: Oracle;
}

/**
 * 基于本地文本语料回答问题。语料在首次使用时加载，addKnowledge 写入后立即重载。
 */
export class KnowledgeAgent implements KnowledgeAdapter {
  public readonly kind = "Knowledge" as const;

  public readonly description =
    "Answers questions about internal data from the local knowledge base. Use it FIRST for internal questions. Action: the question to answer.";

  private readonly directory: string;

  private readonly oracle: Oracle;

  private corpus: string | null = null;

  constructor(options: KnowledgeAgentOptions) {
    this.directory = path.resolve(options.directory);
    this.oracle = options.oracle;
  }

  public isAvailable(): boolean {
    return true;
  }

  public async run(query: string): Promise<string> {
    const knowledge = await this.loadCorpus();
    if (knowledge.trim().length === 0) {
      return EMPTY_KNOWLEDGE_ANSWER;
    }

    const variables = { knowledge, query };
    if (!this.oracle.isConfigured()) {
      return UNCONFIGURED_ORACLE_PREFIX + this.oracle.render(KNOWLEDGE_ANSWER_TEMPLATE, variables);
    }
    return this.oracle.askText(KNOWLEDGE_ANSWER_TEMPLATE, variables);
  }

  public async addKnowledge(name: string, content: string): Promise<string> {
    const safeName = sanitizeKnowledgeName(name);
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(
      path.join(this.directory, `${safeName}.txt`),
      `${content.trim()}\n`,
      "utf8"
    );
    this.corpus = await this.readCorpus();
    return `Knowledge stored in ${safeName}.txt`;
  }

  /** 当前已加载的语料，主要用于调试与测试 */
  public async getCorpus(): Promise<string> {
    return this.loadCorpus();
  }

  private async loadCorpus(): Promise<string> {
    if (this.corpus === null) {
      this.corpus = await this.readCorpus();
    }
    return this.corpus;
  }

  private async readCorpus(): Promise<string> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissingPath(error)) {
        return "";
      }
      throw error;
    }
    const files = entries.filter((entry) => entry.endsWith(".txt")).sort();
    const units = await Promise.all(
      files.map((file) => fs.readFile(path.join(this.directory, file), "utf8"))
    );
    return units.join("\n\n");
  }
}

export function sanitizeKnowledgeName(name: string): string {
  return name.replace(/[^A-Za-z0-9_-]/g, "_");
}

function isMissingPath(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
