import { asc, desc, eq } from 'drizzle-orm'
import { ReferentialErrors, clients, orders, type Client, type FarmStore, type Order } from '@layerfarm/db'
import { createClientSchema, updateClientSchema, type CreateClientInput } from '@layerfarm/schema'
import { rowTotal } from './_sql.js'
import { parseInput } from './validation.js'

export type ClientOrder = Pick<Order, 'id' | 'date' | 'time' | 'status' | 'totalPrice'> & {
  totalBaskets: number
}

export class ClientService {
  constructor(private readonly store: FarmStore) {}

  async createClient(input: CreateClientInput): Promise<string> {
    const data = parseInput(createClientSchema, input)
    const [client] = await this.store.db
      .insert(clients)
      .values({ name: data.name, contact: data.contact ?? null })
      .returning({ id: clients.id })
    return client.id
  }

  listActiveClients(): Promise<Client[]> {
    return this.store.db.select().from(clients).where(eq(clients.active, true)).orderBy(asc(clients.name))
  }

  /** Returns inactive clients too; only unknown ids fail. */
  async getClient(id: string): Promise<Client> {
    const client = await this.store.db.query.clients.findFirst({ where: eq(clients.id, id) })
    if (!client) {
      throw ReferentialErrors.CLIENT_NOT_FOUND(id)
    }
    return client
  }

  async updateClient(id: string, input: CreateClientInput): Promise<Client> {
    const data = parseInput(updateClientSchema, input)
    const [updated] = await this.store.db
      .update(clients)
      .set({ name: data.name, contact: data.contact ?? null })
      .where(eq(clients.id, id))
      .returning()
    if (!updated) {
      throw ReferentialErrors.CLIENT_NOT_FOUND(id)
    }
    return updated
  }

  /** Soft delete: past orders keep pointing at the row. */
  async deactivateClient(id: string): Promise<void> {
    const [updated] = await this.store.db
      .update(clients)
      .set({ active: false })
      .where(eq(clients.id, id))
      .returning({ id: clients.id })
    if (!updated) {
      throw ReferentialErrors.CLIENT_NOT_FOUND(id)
    }
  }

  async getClientHistory(clientId: string): Promise<ClientOrder[]> {
    await this.getClient(clientId)
    return this.store.db
      .select({
        id: orders.id,
        date: orders.date,
        time: orders.time,
        status: orders.status,
        totalPrice: orders.totalPrice,
        totalBaskets: rowTotal(orders).mapWith(Number),
      })
      .from(orders)
      .where(eq(orders.clientId, clientId))
      .orderBy(desc(orders.date), desc(orders.time))
  }
}
