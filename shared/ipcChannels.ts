// Library index
export const LIBRARY_GET_INDEX = 'library:get-index';
export const LIBRARY_RECONCILE = 'library:reconcile';
export const LIBRARY_RECONCILE_TREE = 'library:reconcile-tree';
export const LIBRARY_UPDATE_NOTEBOOK = 'library:update-notebook';

// Notebook table of contents
export const NOTEBOOK_GET_TOC = 'notebook:get-toc';
export const NOTEBOOK_RECONCILE = 'notebook:reconcile';
export const NOTEBOOK_UPDATE_TOC = 'notebook:update-toc';
export const NOTEBOOK_UPDATE_PAGE_TAGS = 'notebook:update-page-tags';
