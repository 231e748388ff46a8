import * as mongodb from 'mongodb'
import { BuildLedger, BuildRecord } from './types'

export const BUILDS_COLLECTION = "builds"

export class MongoBuildLedger implements BuildLedger {
    private readonly client: mongodb.MongoClient
    private readonly builds: mongodb.Collection<BuildRecord>

    private constructor(client: mongodb.MongoClient, database: string) {
        this.client = client
        this.builds = client.db(database).collection<BuildRecord>(BUILDS_COLLECTION)
    }

    public static async connect(uri: string, database: string): Promise<MongoBuildLedger> {
        const client = await mongodb.MongoClient.connect(uri)
        const ledger = new MongoBuildLedger(client, database)
        await ledger.builds.createIndex({startedAt: -1})
        return ledger
    }

    async record(build: BuildRecord): Promise<void> {
        // insertOne adds _id to the document it is given.
        await this.builds.insertOne({...build})
    }

    list(limit: number): Promise<BuildRecord[]> {
        return this.builds.find({}, {projection: {_id: 0}}).sort({startedAt: -1}).limit(limit).toArray()
    }

    close(): Promise<void> {
        return this.client.close()
    }
}
