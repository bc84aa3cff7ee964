import { NextResponse } from 'next/server';
import { analyzeOptionQuote } from '@/lib/actions/options.actions';
import { errorResponse } from '@/lib/api/respond';
import { analysisSchema } from '@/lib/api/schemas';

export async function POST(req: Request) {
  try {
    const json: unknown = await req.json();
    const payload = analysisSchema.parse(json);
    const data = await analyzeOptionQuote(payload);
    return NextResponse.json(data);
  } catch (error) {
    console.error('Option analysis error:', error);
    return errorResponse(error);
  }
}
