export {
  AllocationBalance,
  AllocationRecord,
  IAllocationLedger,
  IAllocationLedgerReader,
} from './interfaces';
export { InMemoryAllocationLedger, DISTRIBUTOR_ROLE } from './inMemoryAllocationLedger';
