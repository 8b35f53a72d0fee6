export { AdmissionModule } from './admission.module';
export { AdmissionService } from './admission.service';
export type { AdmissionOutcome, InboundEvent } from './admission.types';
export { classifyUpdate } from './classify-update';
