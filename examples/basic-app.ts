/**
 * graphwire - Basic Example
 *
 * Demonstrates the core concepts:
 * - Named configuration values
 * - Shared, private and synthesised dependencies
 * - Interface fields checked against a named implementation
 * - Inline settings held by value
 * - Container startup and shutdown
 */

import {
  consoleLogger,
  createContainer,
  defineInterface,
  Inject,
  IService,
} from '../src/index';

// ==================== Interfaces ====================

interface Mailer {
  send(to: string, body: string): Promise<void>;
}

const MailerType = defineInterface<Mailer>('Mailer', ['send']);

// ==================== Services ====================

class ConsoleMailer implements Mailer {
  async send(to: string, body: string): Promise<void> {
    console.log(`[mail] to=${to} body=${body}`);
  }
}

class InvoiceStore {
  private readonly invoices = new Map<string, number>();

  save(id: string, amount: number): void {
    this.invoices.set(id, amount);
  }

  total(): number {
    let sum = 0;
    for (const amount of this.invoices.values()) sum += amount;
    return sum;
  }
}

class RetryPolicy {
  attempts = 0;
  delayMs = 0;
}

class BillingService implements IService {
  @Inject('currency') currency!: string;
  @Inject() store!: InvoiceStore;
  @Inject('mailer', { type: MailerType }) mailer!: Mailer;
  @Inject('inline') retry!: RetryPolicy;
  @Inject('private') pending!: Map<string, number>;

  async startup(): Promise<void> {
    this.retry.attempts = 3;
    console.log(`[billing] started, retrying ${this.retry.attempts} times`);
  }

  async bill(customer: string, amount: number): Promise<void> {
    const id = `${customer}-${this.pending.size + 1}`;
    this.pending.set(id, amount);
    this.store.save(id, amount);
    await this.mailer.send(customer, `invoice ${id}: ${amount} ${this.currency}`);
    this.pending.delete(id);
  }

  shutdown(): void {
    console.log(`[billing] stopped, billed ${this.store.total()} ${this.currency}`);
  }
}

class ReportService {
  @Inject() store!: InvoiceStore;

  summary(): string {
    return `total billed: ${this.store.total()}`;
  }
}

// ==================== Main ====================

async function main(): Promise<void> {
  const container = createContainer({
    name: 'billing-demo',
    logger: consoleLogger,
    traceResolution: true,
  });

  container.registerService('currency', 'EUR');
  container.registerService('mailer', new ConsoleMailer());
  container.registerService('billing', new BillingService());
  container.registerService('reports', new ReportService());

  await container.ready();

  const billing = container.getServiceAs('billing', BillingService);
  await billing.bill('customer@example.com', 120);
  await billing.bill('customer@example.com', 80);

  const reports = container.getServiceAs('reports', ReportService);
  console.log(reports.summary());

  const failures = await container.shutdown();
  if (failures.length > 0) {
    console.error('shutdown failures:', failures);
  }
}

// Run
main().catch(console.error);
