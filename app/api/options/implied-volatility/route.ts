import { NextResponse } from 'next/server';
import { impliedVolatilityForQuote } from '@/lib/actions/options.actions';
import { errorResponse } from '@/lib/api/respond';
import { impliedVolatilitySchema } from '@/lib/api/schemas';

export async function POST(req: Request) {
  try {
    const json: unknown = await req.json();
    const payload = impliedVolatilitySchema.parse(json);
    const data = await impliedVolatilityForQuote(payload);
    return NextResponse.json(data);
  } catch (error) {
    console.error('Implied volatility error:', error);
    return errorResponse(error);
  }
}
