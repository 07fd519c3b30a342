import { DraftPublisher, classifyRejection } from "../../src/EmailService/DraftPublisher";
import { FolderSelectionError, PublishError } from "../../src/EmailService/errors/EmailServiceErrors";
import { IncomingMessage } from "../../src/models/IncomingMessage";
import { MailStoreConnectionError, MailStoreError } from "../../src/Repository/errors/RepositoryErrors";
import { createMockLogger } from "../mocks/mockLogger";
import { createMockMailStore } from "../mocks/mockMailStore";

const NOW = new Date("2025-06-02T10:00:00.000Z");

const message: IncomingMessage = {
    id: "7",
    sender: "alice@example.com",
    senderHeader: "Alice <alice@example.com>",
    subject: "Lunch",
    body: "Are we still on?",
    messageId: "<m1@example.com>",
    references: ["<r0@example.com>"],
};

describe("DraftPublisher", () => {
    let mailStore: ReturnType<typeof createMockMailStore>;
    let logger: ReturnType<typeof createMockLogger>;

    const createPublisher = (draftFolders: string[]) =>
        new DraftPublisher(mailStore, { fromAddress: "me@example.com", draftFolders, now: () => NOW }, logger);

    beforeEach(() => {
        mailStore = createMockMailStore();
        logger = createMockLogger();
    });

    it("should save to the first folder that accepts the draft and never try later ones", async () => {
        mailStore.selectFolder.mockImplementation(async folder => {
            if (folder === "F1") {
                throw new MailStoreError("IMAP select F1 failed: Mailbox doesn't exist", { responseCode: "NONEXISTENT" });
            }
            if (folder === "F2") {
                throw new MailStoreError("IMAP select F2 failed: Permission denied", { responseCode: "NOPERM" });
            }
        });

        const location = await createPublisher(["F1", "F2", "F3", "F4"]).publish(message, "See you there.");

        expect(location).toEqual({
            folder: "F3",
            usedFallback: false,
            attempts: [
                { folder: "F1", accepted: false, rejection: "missing", reason: "IMAP select F1 failed: Mailbox doesn't exist" },
                { folder: "F2", accepted: false, rejection: "denied", reason: "IMAP select F2 failed: Permission denied" },
                { folder: "F3", accepted: true },
            ],
        });
        expect(mailStore.append).toHaveBeenCalledTimes(1);
        expect(mailStore.append).toHaveBeenCalledWith("F3", ["\\Draft"], NOW, expect.any(Buffer));
        expect(mailStore.selectFolder).not.toHaveBeenCalledWith("F4");
        expect(mailStore.selectFolder).toHaveBeenLastCalledWith("INBOX");
    });

    it("should compose a threaded reply addressed to the sender", async () => {
        const draft = (await createPublisher(["Drafts"]).composeReply(message, "See you there.")).toString("utf8");

        expect(draft).toContain("From: me@example.com\r\n");
        expect(draft).toContain("To: alice@example.com\r\n");
        expect(draft).toContain("Subject: Re: Lunch\r\n");
        expect(draft).toContain("In-Reply-To: <m1@example.com>\r\n");
        expect(draft).toContain("References: <r0@example.com> <m1@example.com>\r\n");
        expect(draft).toContain("See you there.");
    });

    it("should fall back to the inbox when every draft folder rejects the append", async () => {
        mailStore.append.mockImplementation(async folder => {
            if (folder !== "INBOX") {
                throw new MailStoreError(`IMAP append to ${folder} failed: [TRYCREATE] no such mailbox`, { responseCode: "TRYCREATE" });
            }
        });

        const location = await createPublisher(["Drafts", "Draft"]).publish(message, "See you there.");

        expect(location.folder).toBe("INBOX");
        expect(location.usedFallback).toBe(true);
        expect(location.attempts.map(attempt => attempt.folder)).toEqual(["Drafts", "Draft", "INBOX"]);
        expect(mailStore.append).toHaveBeenLastCalledWith("INBOX", ["\\Draft"], NOW, expect.any(Buffer));
        expect(logger.warn).toHaveBeenCalledWith(
            "No draft folder accepted the reply, saved to INBOX for email from alice@example.com",
            { subject: "Lunch" }
        );
    });

    it("should raise a PublishError carrying every attempt when the inbox also rejects", async () => {
        mailStore.append.mockRejectedValue(new MailStoreError("IMAP append failed: quota exceeded", { responseCode: "OVERQUOTA" }));

        const publishing = createPublisher(["Drafts"]).publish(message, "See you there.");

        await expect(publishing).rejects.toBeInstanceOf(PublishError);
        await publishing.catch((error: unknown) => {
            expect(error instanceof PublishError ? error.attempts : []).toEqual([
                { folder: "Drafts", accepted: false, rejection: "error", reason: "IMAP append failed: quota exceeded" },
                { folder: "INBOX", accepted: false, rejection: "error", reason: "IMAP append failed: quota exceeded" },
            ]);
        });
        expect(mailStore.selectFolder).toHaveBeenLastCalledWith("INBOX");
    });

    it("should fail when the inbox cannot be reselected after a saved draft", async () => {
        mailStore.selectFolder.mockImplementation(async folder => {
            if (folder === "INBOX") {
                throw new MailStoreError("IMAP select INBOX failed: busy");
            }
        });

        const publishing = createPublisher(["Drafts"]).publish(message, "See you there.");

        await expect(publishing).rejects.toThrow(
            new FolderSelectionError("Unable to reselect INBOX after publishing: MailStoreError: IMAP select INBOX failed: busy", "INBOX")
        );
        expect(mailStore.append).toHaveBeenCalledWith("Drafts", ["\\Draft"], NOW, expect.any(Buffer));
        expect(logger.error).toHaveBeenCalledWith("Unable to reselect INBOX after publishing", {
            error: "MailStoreError: IMAP select INBOX failed: busy",
        });
    });

    describe("classifyRejection", () => {
        it.each([
            [new MailStoreConnectionError("closed"), "disconnected"],
            [new MailStoreError("no", { authenticationFailed: true }), "denied"],
            [new MailStoreError("no", { responseCode: "NOPERM" }), "denied"],
            [new MailStoreError("no", { responseCode: "NONEXISTENT" }), "missing"],
            [new MailStoreError("Unknown Mailbox: Drafts"), "missing"],
            [new MailStoreError("server hiccup"), "error"],
            [new Error("anything else"), "error"],
        ])("should classify %p as %s", (error, expected) => {
            expect(classifyRejection(error)).toBe(expected);
        });
    });
});
