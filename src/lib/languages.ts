/**
 * Language filters offered to API clients. Hard-coded: not scraped from the
 * trending page's own language menu.
 */
export const SUPPORTED_LANGUAGES: readonly string[] = Object.freeze([
	"python",
	"javascript",
	"java",
	"typescript",
	"c++",
	"c",
	"c#",
	"go",
	"rust",
	"php",
	"ruby",
	"swift",
	"kotlin",
	"dart",
	"scala",
	"r",
	"matlab",
	"shell",
	"powershell",
	"html",
	"css",
	"vue",
	"react",
	"angular",
	"node.js",
	"express",
	"django",
	"flask",
	"spring",
	"laravel",
	"rails",
	"asp.net",
]);
