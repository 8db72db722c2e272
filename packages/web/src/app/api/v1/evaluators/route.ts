import { handle, list, ok } from '@/lib/api-response';
import { EvaluatorSchema, readBody, requireCaller } from '@/lib/request';
import { getTenderService } from '@/lib/tender-service';

export async function GET() {
  return handle(() => list(getTenderService().listEvaluators()));
}

export async function POST(request: Request) {
  return handle(async () => {
    const caller = requireCaller(request);
    const { identity } = await readBody(request, EvaluatorSchema);
    await getTenderService().addEvaluator(caller, identity);
    return ok({ identity, evaluator: true }, 201);
  });
}
