import { BaseStatement } from "./BaseStatement";
import { Statement } from "./index";

export interface BlockStatement extends BaseStatement {
    kind: "BlockStatement";
    statements: Statement[];
}
