import { IMailStore } from "../../src/Repository/IMailStore";

/**
 * A connected mail store with an empty inbox; tests override what they need.
 */
export function createMockMailStore(): jest.Mocked<IMailStore> {
    return {
        connect: jest.fn().mockResolvedValue(undefined),
        isConnected: jest.fn().mockReturnValue(true),
        search: jest.fn().mockResolvedValue([]),
        fetch: jest.fn().mockRejectedValue(new Error("no such message")),
        append: jest.fn().mockResolvedValue(undefined),
        setFlag: jest.fn().mockResolvedValue(undefined),
        selectFolder: jest.fn().mockResolvedValue(undefined),
        logout: jest.fn().mockResolvedValue(undefined),
    };
}
