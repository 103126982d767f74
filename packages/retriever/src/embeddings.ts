import OpenAI from "openai";
import { EMBEDDING_MODEL } from "./constants";

let _openai: OpenAI | null = null;
function getOpenAI(): OpenAI {
  if (_openai) return _openai;
  const key = process.env.OPENAI_API_KEY;
  if (!key) throw new Error("OPENAI_API_KEY not set");
  _openai = new OpenAI({ apiKey: key });
  return _openai;
}

export async function embedText(text: string): Promise<number[]> {
  const res = await getOpenAI().embeddings.create({ model: EMBEDDING_MODEL, input: text });
  const vec = res.data[0]?.embedding;
  if (!vec?.length) throw new Error("no embedding returned");
  return vec;
}

export function toFloat32Blob(vec: number[]): Buffer {
  return Buffer.from(new Float32Array(vec).buffer);
}
