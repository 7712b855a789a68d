import { Router, type Request, type Response } from 'express';
import type { MemberAttributes } from '@charity-ledger/shared';
import type { AppServices } from '../../services';
import { validateRegistration } from '../../services/members/directory';
import { asString, isGroupFilter, isMemberGroup, isRecord } from '../../utils/values';

interface MemberPayload {
  name?: unknown;
  shortId?: unknown;
  group?: unknown;
  phone?: unknown;
  email?: unknown;
  address?: unknown;
}

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toAttributes(payload: MemberPayload): MemberAttributes {
  return {
    shortId: optionalText(payload.shortId),
    group: isMemberGroup(payload.group) ? payload.group : undefined,
    phone: optionalText(payload.phone),
    email: optionalText(payload.email),
    address: optionalText(payload.address),
  };
}

export function createMembersRouter(services: AppServices): Router {
  const router = Router();
  const { members } = services;

  router.get('/', (req: Request, res: Response) => {
    const group = asString(req.query.group) ?? 'All';
    if (!isGroupFilter(group)) {
      res.status(400).json({ message: 'group is invalid' });
      return;
    }
    res.status(200).json({ group, names: members.listByGroup(group) });
  });

  router.get('/export', (_req: Request, res: Response) => {
    res.status(200).attachment('members.json').json(members.toDocument());
  });

  router.get('/:name', (req: Request, res: Response) => {
    const name = String(req.params.name);
    res.status(200).json({ name, registered: members.find(name) !== null, profile: members.lookup(name) });
  });

  router.post('/', (req: Request, res: Response) => {
    const payload: MemberPayload = isRecord(req.body) ? req.body : {};
    if (payload.group !== undefined && !isMemberGroup(payload.group)) {
      res.status(400).json({ message: 'group is invalid' });
      return;
    }

    const name = optionalText(payload.name) ?? '';
    const attributes = toAttributes(payload);
    const validationError = validateRegistration(name, attributes);
    if (validationError) {
      res.status(400).json({ message: validationError });
      return;
    }

    const profile = members.register(name, attributes);
    res.status(201).json({ name: name.trim(), profile });
  });

  // Accepts the exported document as JSON, or the raw file as text.
  router.post('/import', (req: Request, res: Response) => {
    if (isRecord(req.body)) {
      res.status(200).json({ merged: members.mergeDocument(req.body) });
      return;
    }
    if (typeof req.body === 'string' && req.body.trim()) {
      res.status(200).json({ merged: members.importDocument(req.body) });
      return;
    }
    res.status(400).json({ message: 'send a JSON object keyed by member name' });
  });

  return router;
}
