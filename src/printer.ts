import { errorMessage, Value } from "./value";

function printList(cells: Value[], open: string, close: string): string {
	return open + cells.map(printValue).join(" ") + close;
}

export function printValue(v: Value): string {
	switch (v.type) {
		case "Number": return v.num.toString();
		case "Error": return `Error: ${errorMessage(v)}`;
		case "Symbol": return v.name;
		case "Function": return "<function>";
		case "SExpr": return printList(v.cells, "(", ")");
		case "QExpr": return printList(v.cells, "{", "}");
	}
}
