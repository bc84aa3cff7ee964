import { NextResponse } from 'next/server';
import { generatePriceSurface } from '@/lib/actions/options.actions';
import { errorResponse } from '@/lib/api/respond';
import { surfaceSchema } from '@/lib/api/schemas';

export async function POST(req: Request) {
  try {
    const json: unknown = await req.json();
    const payload = surfaceSchema.parse(json);
    const data = await generatePriceSurface(payload);
    return NextResponse.json(data);
  } catch (error) {
    console.error('Option surface error:', error);
    return errorResponse(error);
  }
}
