import { loadAssemblerConfig } from '../main/config/load'

describe("assembler configuration", () => {
    it("applies defaults", () => {
        expect(loadAssemblerConfig(undefined)).toEqual({recipe: "assembler.json", docker: "docker"})
    })

    it("defaults the ledger database", () => {
        expect(loadAssemblerConfig({ledger: {uri: "mongodb://localhost:27017"}}).ledger).toEqual({
            uri: "mongodb://localhost:27017",
            database: "assembler",
        })
    })

    it("drops keys it does not know", () => {
        expect(loadAssemblerConfig({tag: "tools:1", loadConfig: () => ({})})).toEqual({
            recipe: "assembler.json",
            docker: "docker",
            tag: "tools:1",
        })
    })

    it("names the file and the bad key", () => {
        expect(() => loadAssemblerConfig({ledger: {uri: "localhost"}}))
            .toThrow("Invalid configuration in .assemblerrc: ledger.uri: must be a mongodb:// connection string")
    })
})
