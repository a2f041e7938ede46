export * from './types';
export { AvailabilityModel, TimeOffModel } from './Availability';
export { AppointmentModel } from './Appointment';
export { ConsultationModel } from './Consultation';
export { OutboxModel } from './Outbox';
export { PoolExecutor, ClientExecutor, type QueryExecutor } from './executor';
export { PostgresSchedulingStore } from './postgresStore';
export { InMemorySchedulingStore, type InMemorySchedulingStoreOptions } from './memoryStore';
