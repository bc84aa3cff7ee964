import { NextResponse } from 'next/server';
import { priceOptionContract } from '@/lib/actions/options.actions';
import { errorResponse } from '@/lib/api/respond';
import { pricingSchema } from '@/lib/api/schemas';

export async function POST(req: Request) {
  try {
    const json: unknown = await req.json();
    const payload = pricingSchema.parse(json);
    const data = await priceOptionContract(payload);
    return NextResponse.json(data);
  } catch (error) {
    console.error('Option pricing error:', error);
    return errorResponse(error);
  }
}
