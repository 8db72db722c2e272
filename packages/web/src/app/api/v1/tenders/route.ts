import { handle, list, ok } from '@/lib/api-response';
import { NewTenderSchema, StatusFilterSchema, readBody, requireCaller } from '@/lib/request';
import { getTenderService } from '@/lib/tender-service';

export async function GET(request: Request) {
  return handle(() => {
    const status = StatusFilterSchema.parse(
      new URL(request.url).searchParams.get('status') ?? undefined,
    );
    const tenders = getTenderService().listTenders();
    return list(status ? tenders.filter((tender) => tender.status === status) : tenders);
  });
}

export async function POST(request: Request) {
  return handle(async () => {
    const caller = requireCaller(request);
    const body = await readBody(request, NewTenderSchema);
    const tender = await getTenderService().createTender(caller, {
      description: body.description,
      maxPrice: body.max_price,
      deadlineDays: body.deadline_days,
      weightPrice: body.weight_price,
      weightQuality: body.weight_quality,
    });
    return ok(tender, 201);
  });
}
