export { validatePayload, ACCEPTED_KINDS, type PayloadKind } from './value-validator';
