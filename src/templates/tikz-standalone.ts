// Standalone TikZ document. Each {{PLACEHOLDER}} appears exactly once.
// The \show* switches and the per-prefix switch are edited by hand before typesetting.

export const TIKZ_STANDALONE_TEMPLATE = [
  "",
  "% This file was automatically generated by tikz-netexport",
  "\\documentclass{standalone}",
  "",
  "% latex packages",
  "\\usepackage{tikz}",
  "\\usetikzlibrary{positioning, arrows, shapes, calc}",
  "",
  "% color definitions",
  "\\usepackage{xcolor}",
  "\\definecolor{gray-50}{HTML}{F9FAFB}",
  "\\definecolor{gray-300}{HTML}{D1D5DB}",
  "\\definecolor{gray-700}{HTML}{374151}",
  "\\definecolor{red-500}{HTML}{EF4444}",
  "\\definecolor{yellow-500}{HTML}{EAB308}",
  "\\definecolor{green-500}{HTML}{22C55E}",
  "\\definecolor{blue-500}{HTML}{3B82F6}",
  "\\definecolor{purple-500}{HTML}{A855F7}",
  "",
  "% Parameters to edit",
  "\\def\\width{8}%cm",
  "\\def\\height{-6}%cm (negative)",
  "\\def\\linkweightdist{0.3}",
  "",
  "% tikzset styles",
  "\\tikzset{",
  "  router/.style = {circle, fill=gray-50, draw=gray-700, minimum size=0.4cm},",
  "  external/.style = {circle, fill=gray-300, draw=gray-700, minimum size=0.4cm},",
  "  link/.style = {gray-700},",
  "  next hop/.style = {very thick, -latex, blue-500},",
  "  ebgp session/.style = {very thick, -latex, red-500},",
  "  ibgp peer session/.style = {very thick, latex-latex, blue-500},",
  "  ibgp client session/.style = {very thick, -latex, purple-500},",
  "  bgp propagation/.style = {very thick, -latex, yellow-500},",
  "  link weight/.style = {fill=white},",
  "}",
  "",
  "% things to draw",
  "\\def\\showNextHop{1}",
  "% \\def\\showLinkWeights{1}",
  "% \\def\\showBgpSessions{1}",
  "% \\def\\showBgpPropagation{1}",
  "% \\def\\showRouterName{1}",
  "\\def\\prefix1{1} % choices: {{PREFIXES}}",
  "",
  "\\begin{document}",
  "\\begin{tikzpicture}[xscale=\\width, yscale=\\height]",
  "{{INTERNAL_NODES}}",
  "{{EXTERNAL_NODES}}",
  "",
  "{{EDGES}}",
  "",
  "  \\ifdefined\\showNextHop",
  "{{NEXT_HOPS}}",
  "  \\fi",
  "",
  "  \\ifdefined\\showLinkWeights",
  "{{LINK_WEIGHTS}}",
  "  \\fi",
  "",
  "  \\ifdefined\\showBgpSessions",
  "{{BGP_SESSIONS}}",
  "  \\fi",
  "",
  "  \\ifdefined\\showBgpPropagation",
  "{{BGP_PROPAGATIONS}}",
  "  \\fi",
  "\\end{tikzpicture}",
  "\\end{document}",
  "",
].join("\n");
