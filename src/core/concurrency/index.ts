export * from './sleep';
export * from './semaphore';
export * from './mutex';
