import { handle, ok } from '@/lib/api-response';
import { AuthorityTransferSchema, readBody, requireCaller } from '@/lib/request';
import { getTenderService } from '@/lib/tender-service';

export async function GET() {
  return handle(() => ok({ authority: getTenderService().currentAuthority() }));
}

export async function PUT(request: Request) {
  return handle(async () => {
    const caller = requireCaller(request);
    const { new_authority } = await readBody(request, AuthorityTransferSchema);
    const service = getTenderService();
    await service.transferAuthority(caller, new_authority);
    return ok({ authority: service.currentAuthority() });
  });
}
