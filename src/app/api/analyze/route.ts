import { analyzeUpload } from "@/lib/csv/analyze";
import { AnalyzeError } from "@/lib/errors";
import { errorResponse } from "@/lib/http";

export const runtime = "nodejs";

async function readUpload(req: Request): Promise<File> {
  let formData: FormData;
  try {
    formData = await req.formData();
  } catch {
    throw new AnalyzeError("missing_file", "No file provided");
  }
  const file = formData.get("file");
  if (file === null || typeof file === "string") throw new AnalyzeError("missing_file", "No file provided");
  return file;
}

export async function POST(req: Request) {
  try {
    const file = await readUpload(req);
    const bytes = new Uint8Array(await file.arrayBuffer());
    return Response.json(analyzeUpload({ filename: file.name, bytes }));
  } catch (err) {
    return errorResponse(err, "analyze");
  }
}
